import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { todayIsoDate } from '../lib/dates';
import { JobApplicationsRepository } from './job-applications.repository';
import {
    JOB_STATUSES,
    RECENT_JOBS_LIMIT,
    RESUME_CHOICES,
} from './job-application.constants';
import { emptyFormValues, formValuesFromJob } from './job-application.validation';
import {
    JobApplication,
    JobApplicationInput,
    JobFormValues,
} from './interfaces/job-application.interface';
import {
    DashboardView,
    JobDetailsView,
    JobFormView,
    JobListView,
} from './interfaces/job-views.interface';

export interface FormState {
    csrfToken: string;
    values?: JobFormValues;
    errors?: Record<string, string>;
}

@Injectable()
export class JobsService {
    private readonly logger = new Logger(JobsService.name);

    constructor(private readonly jobApplicationsRepository: JobApplicationsRepository) {}

    async getDashboard(): Promise<DashboardView> {
        const [totalJobs, recentJobs] = await Promise.all([
            this.jobApplicationsRepository.countAll(),
            this.jobApplicationsRepository.listRecent(RECENT_JOBS_LIMIT),
        ]);

        const counts = await Promise.all(
            JOB_STATUSES.map((status) => this.jobApplicationsRepository.countByStatus(status)),
        );

        const statuses: Record<string, number> = {};
        JOB_STATUSES.forEach((status, index) => {
            if (counts[index] > 0) statuses[status] = counts[index];
        });

        return { title: 'Dashboard', totalJobs, recentJobs, statuses };
    }

    /** An empty or missing filter lists everything. */
    async getJobList(statusFilter?: string): Promise<JobListView> {
        const filter = statusFilter ? statusFilter : null;
        const jobs = filter
            ? await this.jobApplicationsRepository.listByStatus(filter)
            : await this.jobApplicationsRepository.listAll();

        return { title: 'Jobs', jobs, statusFilter: filter, statusChoices: JOB_STATUSES };
    }

    async findJob(id: number): Promise<JobApplication> {
        const job = await this.jobApplicationsRepository.getById(id);
        if (!job) {
            throw new NotFoundException(`Job application ${id} was not found.`);
        }
        return job;
    }

    async getJobDetails(id: number): Promise<JobDetailsView> {
        const job = await this.findJob(id);
        return { title: `${job.company} - ${job.position}`, job };
    }

    async createJob(input: JobApplicationInput): Promise<number> {
        const id = await this.jobApplicationsRepository.insert(input);
        this.logger.log(`Created job application ${id} (${input.company})`);
        return id;
    }

    async updateJob(id: number, input: JobApplicationInput): Promise<JobApplication> {
        const job = await this.jobApplicationsRepository.update(id, input);
        if (!job) {
            throw new NotFoundException(`Job application ${id} was not found.`);
        }
        this.logger.log(`Updated job application ${id}`);
        return job;
    }

    /** The add form; application date defaults to today when first shown. */
    buildAddForm(state: FormState): JobFormView {
        const values = state.values ?? {
            ...emptyFormValues(),
            application_date: todayIsoDate(),
            status: JOB_STATUSES[0],
            resume_used: RESUME_CHOICES[0],
        };

        return {
            title: 'Add Job',
            mode: 'add',
            action: '/add-job',
            jobId: null,
            values,
            errors: state.errors ?? {},
            statusChoices: JOB_STATUSES,
            resumeChoices: RESUME_CHOICES,
            csrfToken: state.csrfToken,
        };
    }

    buildEditForm(job: JobApplication, state: FormState): JobFormView {
        return {
            title: `Edit ${job.company} - ${job.position}`,
            mode: 'edit',
            action: `/job/${job.id}/edit`,
            jobId: job.id,
            values: state.values ?? formValuesFromJob(job),
            errors: state.errors ?? {},
            statusChoices: JOB_STATUSES,
            resumeChoices: RESUME_CHOICES,
            csrfToken: state.csrfToken,
        };
    }
}
