// dto/job-application-form.dto.ts
import { Transform, TransformFnParams } from 'class-transformer';
import {
    IsIn,
    IsISO8601,
    IsNotEmpty,
    IsOptional,
    IsString,
    Matches,
    MaxLength,
} from 'class-validator';
import {
    JOB_STATUSES,
    JobStatus,
    MAX_LENGTHS,
    RESUME_CHOICES,
    ResumeChoice,
} from '../job-application.constants';

const REQUIRED = 'This field is required.';
const INVALID_CHOICE = 'Not a valid choice.';
const INVALID_DATE = 'Not a valid date value.';
const INVALID_TEXT = 'Not a valid text value.';
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const trim = ({ value }: TransformFnParams): unknown =>
    typeof value === 'string' ? value.trim() : value;

// Optional inputs left blank are stored as NULL
const blankToNull = ({ value }: TransformFnParams): unknown => {
    if (typeof value !== 'string') return value;
    const trimmed = value.trim();
    return trimmed.length ? trimmed : null;
};

const tooLong = (max: number) => `Field cannot be longer than ${max} characters.`;

export class JobApplicationFormDto {
    @Transform(trim)
    @IsNotEmpty({ message: REQUIRED })
    @IsString({ message: INVALID_DATE })
    @Matches(DATE_PATTERN, { message: INVALID_DATE })
    @IsISO8601({ strict: true }, { message: INVALID_DATE })
    application_date!: string;

    @IsIn([...JOB_STATUSES], { message: INVALID_CHOICE })
    status!: JobStatus;

    @Transform(trim)
    @IsNotEmpty({ message: REQUIRED })
    @IsString({ message: INVALID_TEXT })
    @MaxLength(MAX_LENGTHS.company, { message: tooLong(MAX_LENGTHS.company) })
    company!: string;

    @Transform(trim)
    @IsNotEmpty({ message: REQUIRED })
    @IsString({ message: INVALID_TEXT })
    @MaxLength(MAX_LENGTHS.position, { message: tooLong(MAX_LENGTHS.position) })
    position!: string;

    @IsNotEmpty({ message: REQUIRED })
    @IsIn([...RESUME_CHOICES], { message: INVALID_CHOICE })
    resume_used!: ResumeChoice;

    @Transform(blankToNull)
    @IsOptional()
    @IsString({ message: INVALID_TEXT })
    @MaxLength(MAX_LENGTHS.job_url, { message: tooLong(MAX_LENGTHS.job_url) })
    job_url?: string | null;

    @Transform(blankToNull)
    @IsOptional()
    @IsString({ message: INVALID_TEXT })
    job_description?: string | null;

    @Transform(blankToNull)
    @IsOptional()
    @IsString({ message: INVALID_TEXT })
    notes?: string | null;

    @Transform(blankToNull)
    @IsOptional()
    @IsString({ message: INVALID_TEXT })
    @MaxLength(MAX_LENGTHS.salary, { message: tooLong(MAX_LENGTHS.salary) })
    salary?: string | null;
}
