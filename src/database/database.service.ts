import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import * as mysql from 'mysql2/promise';
import type { FieldPacket, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { AppConfigService } from '../config/config.service';
import { StorageError } from './storage.error';

export type SqlParam = string | number | null;

type ExecuteFn = <T extends RowDataPacket[] | ResultSetHeader>(
    sql: string,
    params: SqlParam[],
) => Promise<[T, FieldPacket[]]>;

/**
 * Statement runner bound either to the pool (one borrowed connection per
 * statement) or to a single connection inside a transaction.
 */
export class SqlSession {
    constructor(
        private readonly run: ExecuteFn,
        private readonly wrap: (error: unknown, sql: string) => StorageError,
    ) {}

    async query<T extends RowDataPacket>(sql: string, params: SqlParam[] = []): Promise<T[]> {
        try {
            const [rows] = await this.run<T[]>(sql, params);
            return rows;
        } catch (error) {
            throw this.wrap(error, sql);
        }
    }

    async queryOne<T extends RowDataPacket>(sql: string, params: SqlParam[] = []): Promise<T | null> {
        const rows = await this.query<T>(sql, params);
        return rows[0] ?? null;
    }

    async execute(sql: string, params: SqlParam[] = []): Promise<ResultSetHeader> {
        try {
            const [result] = await this.run<ResultSetHeader>(sql, params);
            return result;
        } catch (error) {
            throw this.wrap(error, sql);
        }
    }
}

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
    private readonly logger = new Logger(DatabaseService.name);
    private pool: mysql.Pool | null = null;
    private session: SqlSession | null = null;

    constructor(private readonly configService: AppConfigService) {}

    async onModuleInit() {
        await this.connect();
    }

    async onModuleDestroy() {
        await this.disconnect();
    }

    async connect(): Promise<void> {
        const dbConfig = this.configService.database;

        const pool = mysql.createPool({
            host: dbConfig.host,
            port: dbConfig.port,
            user: dbConfig.username,
            password: dbConfig.password,
            database: dbConfig.database,
            charset: dbConfig.charset,
            timezone: dbConfig.timezone,
            // DATE columns come back as 'YYYY-MM-DD' instead of a midnight Date
            dateStrings: ['DATE'],
            waitForConnections: true,
            connectionLimit: dbConfig.connectionLimit,
            queueLimit: 0,
        });

        this.pool = pool;
        this.session = new SqlSession(
            <T extends RowDataPacket[] | ResultSetHeader>(sql: string, params: SqlParam[]) =>
                pool.execute<T>(sql, params),
            (error, sql) => this.toStorageError(error, sql),
        );

        this.logger.log(
            `MySQL pool ready for ${dbConfig.username}@${dbConfig.host}:${dbConfig.port}/${dbConfig.database}`,
        );
    }

    async disconnect(): Promise<void> {
        const pool = this.pool;
        this.pool = null;
        this.session = null;
        if (!pool) {
            return;
        }

        try {
            await pool.end();
            this.logger.log('MySQL pool closed');
        } catch (error) {
            this.logger.error('Failed to close MySQL pool', error instanceof Error ? error.stack : String(error));
        }
    }

    async query<T extends RowDataPacket>(sql: string, params: SqlParam[] = []): Promise<T[]> {
        return this.requireSession().query<T>(sql, params);
    }

    async queryOne<T extends RowDataPacket>(sql: string, params: SqlParam[] = []): Promise<T | null> {
        return this.requireSession().queryOne<T>(sql, params);
    }

    async execute(sql: string, params: SqlParam[] = []): Promise<ResultSetHeader> {
        return this.requireSession().execute(sql, params);
    }

    /**
     * Runs the callback on one pooled connection inside a transaction. The
     * connection is released on every exit path.
     */
    async transaction<T>(callback: (session: SqlSession) => Promise<T>): Promise<T> {
        const pool = this.requirePool();

        const connection = await pool.getConnection().catch((error: unknown) => {
            throw this.toStorageError(error, 'getConnection');
        });

        const session = new SqlSession(
            <T extends RowDataPacket[] | ResultSetHeader>(sql: string, params: SqlParam[]) =>
                connection.execute<T>(sql, params),
            (error, sql) => this.toStorageError(error, sql),
        );

        try {
            await connection.beginTransaction();
            const result = await callback(session);
            await connection.commit();
            return result;
        } catch (error) {
            try {
                await connection.rollback();
            } catch (rollbackError) {
                this.logger.error(
                    'Transaction rollback failed',
                    rollbackError instanceof Error ? rollbackError.stack : String(rollbackError),
                );
            }
            throw error instanceof StorageError ? error : this.toStorageError(error, 'transaction');
        } finally {
            connection.release();
        }
    }

    async healthCheck(): Promise<boolean> {
        if (!this.pool) {
            return false;
        }

        try {
            await this.pool.query('SELECT 1');
            return true;
        } catch (error) {
            this.logger.warn(`Health check query failed: ${describe(error)}`);
            return false;
        }
    }

    private requirePool(): mysql.Pool {
        if (!this.pool) {
            throw new StorageError('Database pool has not been initialised');
        }
        return this.pool;
    }

    private requireSession(): SqlSession {
        if (!this.session) {
            throw new StorageError('Database pool has not been initialised');
        }
        return this.session;
    }

    private toStorageError(error: unknown, sql: string): StorageError {
        if (error instanceof StorageError) {
            return error;
        }
        this.logger.error(`Statement failed (${firstLine(sql)}): ${describe(error)}`);
        return new StorageError(describe(error), { cause: error });
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function firstLine(sql: string): string {
    return sql.trim().split('\n')[0];
}
