import { JobFormField, JobStatus, ResumeChoice } from '../job-application.constants';

/** One stored row of the job_application table. */
export interface JobApplication {
    id: number;
    application_date: string; // YYYY-MM-DD
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

/** Every mutable column; what "add" inserts and "edit" overwrites. */
export interface JobApplicationInput {
    application_date: string;
    status: JobStatus;
    company: string;
    position: string;
    resume_used: ResumeChoice;
    job_url: string | null;
    job_description: string | null;
    notes: string | null;
    salary: string | null;
}

/** Raw form values as typed by the user, used to re-fill the form. */
export type JobFormValues = Record<JobFormField, string>;

export interface FieldError {
    field: string;
    message: string;
}

export type JobFormValidationResult =
    | { success: true; value: JobApplicationInput }
    | { success: false; errors: FieldError[] };
