import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { JobApplicationFormDto } from './dto/job-application-form.dto';
import { JOB_FORM_FIELDS } from './job-application.constants';
import {
    FieldError,
    JobApplication,
    JobFormValidationResult,
    JobFormValues,
} from './interfaces/job-application.interface';

// Constraint reported first when several fail on one field
const CONSTRAINT_PRIORITY = ['isNotEmpty', 'isIn', 'isString', 'matches', 'isIso8601', 'maxLength'];

/**
 * Checks a submitted add/edit form. Shared by both handlers: either the
 * normalized input ready for the repository, or one error per failing field.
 */
export function validateJobApplicationForm(body: Record<string, unknown>): JobFormValidationResult {
    const dto = plainToInstance(JobApplicationFormDto, pickFormFields(body));
    const failures = validateSync(dto);

    if (failures.length > 0) {
        const errors: FieldError[] = failures.map((failure) => ({
            field: failure.property,
            message: pickMessage(failure.constraints ?? {}),
        }));
        return { success: false, errors: sortByFormOrder(errors) };
    }

    return {
        success: true,
        value: {
            application_date: dto.application_date,
            status: dto.status,
            company: dto.company,
            position: dto.position,
            resume_used: dto.resume_used,
            job_url: dto.job_url ?? null,
            job_description: dto.job_description ?? null,
            notes: dto.notes ?? null,
            salary: dto.salary ?? null,
        },
    };
}

/** Submitted values as strings, for re-displaying a rejected form. */
export function formValuesFromBody(body: Record<string, unknown>): JobFormValues {
    const values = emptyFormValues();
    for (const field of JOB_FORM_FIELDS) {
        const raw = body[field];
        values[field] = typeof raw === 'string' ? raw : '';
    }
    return values;
}

export function formValuesFromJob(job: JobApplication): JobFormValues {
    return {
        application_date: job.application_date,
        status: job.status,
        company: job.company,
        position: job.position,
        resume_used: job.resume_used,
        job_url: job.job_url ?? '',
        job_description: job.job_description ?? '',
        notes: job.notes ?? '',
        salary: job.salary ?? '',
    };
}

export function emptyFormValues(): JobFormValues {
    return {
        application_date: '',
        status: '',
        company: '',
        position: '',
        resume_used: '',
        job_url: '',
        job_description: '',
        notes: '',
        salary: '',
    };
}

export function errorsByField(errors: FieldError[]): Record<string, string> {
    const byField: Record<string, string> = {};
    for (const { field, message } of errors) {
        if (!(field in byField)) byField[field] = message;
    }
    return byField;
}

function pickFormFields(body: Record<string, unknown>): Record<string, unknown> {
    const picked: Record<string, unknown> = {};
    for (const field of JOB_FORM_FIELDS) {
        if (field in body) picked[field] = body[field];
    }
    return picked;
}

function pickMessage(constraints: Record<string, string>): string {
    for (const name of CONSTRAINT_PRIORITY) {
        const message = constraints[name];
        if (message) return message;
    }
    return Object.values(constraints)[0] ?? 'Invalid value.';
}

function sortByFormOrder(errors: FieldError[]): FieldError[] {
    const order = (field: string) => {
        const index = JOB_FORM_FIELDS.findIndex((name) => name === field);
        return index === -1 ? JOB_FORM_FIELDS.length : index;
    };
    return [...errors].sort((a, b) => order(a.field) - order(b.field));
}
