import { JobStatus, ResumeChoice } from '../job-application.constants';
import { JobApplication, JobFormValues } from './job-application.interface';

export interface DashboardView {
    title: string;
    totalJobs: number;
    recentJobs: JobApplication[];
    // status -> count, enumeration order, zero counts omitted
    statuses: Record<string, number>;
}

export interface JobListView {
    title: string;
    jobs: JobApplication[];
    statusFilter: string | null;
    statusChoices: readonly JobStatus[];
}

export interface JobFormView {
    title: string;
    mode: 'add' | 'edit';
    action: string;
    jobId: number | null;
    values: JobFormValues;
    errors: Record<string, string>;
    statusChoices: readonly JobStatus[];
    resumeChoices: readonly ResumeChoice[];
    csrfToken: string;
}

export interface JobDetailsView {
    title: string;
    job: JobApplication;
}
