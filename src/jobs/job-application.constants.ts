export const JOB_STATUSES = [
    'Waiting for Response',
    'Interviewing',
    'Rejected Application',
    'Ghosted Application',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

// Single choice for now; kept as a list so the form renders a select.
export const RESUME_CHOICES = ['Default Resume'] as const;

export type ResumeChoice = (typeof RESUME_CHOICES)[number];

export const RECENT_JOBS_LIMIT = 5;

/** Every field the add/edit form submits, in display order. */
export const JOB_FORM_FIELDS = [
    'application_date',
    'status',
    'company',
    'position',
    'resume_used',
    'job_url',
    'job_description',
    'notes',
    'salary',
] as const;

export type JobFormField = (typeof JOB_FORM_FIELDS)[number];

export const MAX_LENGTHS = {
    company: 120,
    position: 200,
    job_url: 500,
    salary: 50,
} as const;
