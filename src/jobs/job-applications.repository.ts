import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { RowDataPacket } from 'mysql2/promise';
import { DatabaseService, SqlParam, SqlSession } from '../database/database.service';
import { StorageError } from '../database/storage.error';
import { JobApplication, JobApplicationInput } from './interfaces/job-application.interface';

interface JobApplicationRow extends RowDataPacket {
    id: number;
    application_date: string;
    status: string;
    company: string;
    position: string;
    resume_used: string;
    job_url: string | null;
    job_description: string | null;
    notes: string | null;
    salary: string | null;
    created_at: Date;
}

interface CountRow extends RowDataPacket {
    total: number | string;
}

// sql/ sits at the project root, and is copied beside the compiled src/ on build
export const SCHEMA_FILE = path.join(__dirname, '..', '..', 'sql', 'schema.sql');

const COLUMNS = `id, application_date, status, company, position, resume_used,
        job_url, job_description, notes, salary, created_at`;

// Newest application first; same-day entries by insertion order
const ORDER_BY = 'ORDER BY application_date DESC, id DESC';

@Injectable()
export class JobApplicationsRepository implements OnModuleInit {
    private readonly logger = new Logger(JobApplicationsRepository.name);

    constructor(private readonly databaseService: DatabaseService) {}

    async onModuleInit() {
        await this.applySchema();
    }

    async applySchema(): Promise<void> {
        const ddl = await fs.readFile(SCHEMA_FILE, 'utf8');
        await this.databaseService.execute(ddl);
        this.logger.log('job_application table is ready');
    }

    async insert(record: JobApplicationInput): Promise<number> {
        const sql = `
      INSERT INTO job_application
        (application_date, status, company, position, resume_used,
         job_url, job_description, notes, salary)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;
        const result = await this.databaseService.execute(sql, toParams(record));
        return result.insertId;
    }

    async getById(id: number): Promise<JobApplication | null> {
        return findById(this.databaseService, id);
    }

    async listAll(): Promise<JobApplication[]> {
        const rows = await this.databaseService.query<JobApplicationRow>(
            `SELECT ${COLUMNS} FROM job_application ${ORDER_BY}`,
        );
        return rows.map(toJobApplication);
    }

    /** Raw equality on status; values outside the enumeration simply match nothing. */
    async listByStatus(status: string): Promise<JobApplication[]> {
        const rows = await this.databaseService.query<JobApplicationRow>(
            `SELECT ${COLUMNS} FROM job_application WHERE status = ? ${ORDER_BY}`,
            [status],
        );
        return rows.map(toJobApplication);
    }

    async listRecent(limit: number): Promise<JobApplication[]> {
        if (!Number.isInteger(limit) || limit < 0) {
            throw new StorageError(`Invalid limit: ${limit}`);
        }
        // LIMIT placeholders are rejected by some server versions in prepared statements
        const rows = await this.databaseService.query<JobApplicationRow>(
            `SELECT ${COLUMNS} FROM job_application ${ORDER_BY} LIMIT ${limit}`,
        );
        return rows.map(toJobApplication);
    }

    /** Overwrites every mutable column. id and created_at are never written. */
    async update(id: number, fields: JobApplicationInput): Promise<JobApplication | null> {
        return this.databaseService.transaction(async (session) => {
            const sql = `
        UPDATE job_application
        SET application_date = ?, status = ?, company = ?, position = ?, resume_used = ?,
            job_url = ?, job_description = ?, notes = ?, salary = ?
        WHERE id = ?
      `;
            await session.execute(sql, [...toParams(fields), id]);
            return findById(session, id);
        });
    }

    async countAll(): Promise<number> {
        const row = await this.databaseService.queryOne<CountRow>(
            'SELECT COUNT(*) AS total FROM job_application',
        );
        return Number(row?.total ?? 0);
    }

    async countByStatus(status: string): Promise<number> {
        const row = await this.databaseService.queryOne<CountRow>(
            'SELECT COUNT(*) AS total FROM job_application WHERE status = ?',
            [status],
        );
        return Number(row?.total ?? 0);
    }
}

async function findById(
    runner: Pick<SqlSession, 'queryOne'>,
    id: number,
): Promise<JobApplication | null> {
    const row = await runner.queryOne<JobApplicationRow>(
        `SELECT ${COLUMNS} FROM job_application WHERE id = ?`,
        [id],
    );
    return row ? toJobApplication(row) : null;
}

function toParams(record: JobApplicationInput): SqlParam[] {
    return [
        record.application_date,
        record.status,
        record.company,
        record.position,
        record.resume_used,
        record.job_url,
        record.job_description,
        record.notes,
        record.salary,
    ];
}

function toJobApplication(row: JobApplicationRow): JobApplication {
    return {
        id: row.id,
        application_date: row.application_date,
        status: row.status,
        company: row.company,
        position: row.position,
        resume_used: row.resume_used,
        job_url: row.job_url,
        job_description: row.job_description,
        notes: row.notes,
        salary: row.salary,
        created_at: row.created_at,
    };
}
