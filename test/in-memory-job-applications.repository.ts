import {
    JobApplication,
    JobApplicationInput,
} from '../src/jobs/interfaces/job-application.interface';

/**
 * Stand-in for JobApplicationsRepository that keeps rows in memory and
 * mirrors its ordering (application_date DESC, id DESC).
 */
export class InMemoryJobApplicationsRepository {
    private rows: JobApplication[] = [];
    private nextId = 1;

    async insert(record: JobApplicationInput): Promise<number> {
        const id = this.nextId++;
        this.rows.push({ ...record, id, created_at: new Date() });
        return id;
    }

    async getById(id: number): Promise<JobApplication | null> {
        const row = this.rows.find((r) => r.id === id);
        return row ? { ...row } : null;
    }

    async listAll(): Promise<JobApplication[]> {
        return this.sorted(this.rows);
    }

    async listByStatus(status: string): Promise<JobApplication[]> {
        return this.sorted(this.rows.filter((r) => r.status === status));
    }

    async listRecent(limit: number): Promise<JobApplication[]> {
        return this.sorted(this.rows).slice(0, limit);
    }

    async update(id: number, fields: JobApplicationInput): Promise<JobApplication | null> {
        const index = this.rows.findIndex((r) => r.id === id);
        if (index === -1) return null;
        const current = this.rows[index];
        this.rows[index] = { ...fields, id: current.id, created_at: current.created_at };
        return { ...this.rows[index] };
    }

    async countAll(): Promise<number> {
        return this.rows.length;
    }

    async countByStatus(status: string): Promise<number> {
        return this.rows.filter((r) => r.status === status).length;
    }

    private sorted(rows: JobApplication[]): JobApplication[] {
        return [...rows]
            .sort((a, b) =>
                a.application_date === b.application_date
                    ? b.id - a.id
                    : a.application_date < b.application_date
                      ? 1
                      : -1,
            )
            .map((r) => ({ ...r }));
    }
}
