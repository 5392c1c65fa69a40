import {
    Body,
    Controller,
    Get,
    Header,
    HttpStatus,
    Param,
    ParseIntPipe,
    Post,
    Query,
    Req,
    Res,
} from '@nestjs/common';
import { CSRF_ERROR, CSRF_FIELD, CsrfService } from '../common/csrf/csrf.service';
import { FormRequest, HtmlResponse } from '../common/http.types';
import { JobsService } from './jobs.service';
import {
    errorsByField,
    formValuesFromBody,
    validateJobApplicationForm,
} from './job-application.validation';
import { JobFormValidationResult } from './interfaces/job-application.interface';
import { renderDashboard } from './views/dashboard.view';
import { renderJobDetails } from './views/job-details.view';
import { renderJobForm } from './views/job-form.view';
import { renderJobList } from './views/job-list.view';

// Non-numeric ids are unknown records, not bad requests
const JobIdPipe = new ParseIntPipe({ errorHttpStatusCode: HttpStatus.NOT_FOUND });

@Controller()
export class JobsController {
    constructor(
        private readonly jobsService: JobsService,
        private readonly csrfService: CsrfService,
    ) {}

    @Get()
    @Header('Content-Type', 'text/html; charset=utf-8')
    async dashboard(): Promise<string> {
        return renderDashboard(await this.jobsService.getDashboard());
    }

    @Get('jobs')
    @Header('Content-Type', 'text/html; charset=utf-8')
    async list(@Query('status') status?: unknown): Promise<string> {
        // Repeated keys arrive as arrays, bracketed keys as objects
        const first: unknown = Array.isArray(status) ? status[0] : status;
        const filter = typeof first === 'string' ? first : undefined;
        return renderJobList(await this.jobsService.getJobList(filter));
    }

    @Get('add-job')
    showAddForm(@Res() res: HtmlResponse) {
        const csrfToken = this.csrfService.issue(res);
        const view = this.jobsService.buildAddForm({ csrfToken });
        res.status(HttpStatus.OK).type('html').send(renderJobForm(view));
    }

    @Post('add-job')
    async submitAddForm(
        @Req() req: FormRequest,
        @Body() body: Record<string, unknown>,
        @Res() res: HtmlResponse,
    ) {
        const result = this.validateSubmission(req, body);

        if (!result.success) {
            const view = this.jobsService.buildAddForm({
                csrfToken: this.csrfService.issue(res),
                values: formValuesFromBody(body),
                errors: errorsByField(result.errors),
            });
            res.status(HttpStatus.OK).type('html').send(renderJobForm(view));
            return;
        }

        await this.jobsService.createJob(result.value);
        res.redirect(HttpStatus.FOUND, '/jobs');
    }

    @Get('job/:id')
    @Header('Content-Type', 'text/html; charset=utf-8')
    async details(@Param('id', JobIdPipe) id: number): Promise<string> {
        return renderJobDetails(await this.jobsService.getJobDetails(id));
    }

    @Get('job/:id/edit')
    async showEditForm(@Param('id', JobIdPipe) id: number, @Res() res: HtmlResponse) {
        const job = await this.jobsService.findJob(id);
        const view = this.jobsService.buildEditForm(job, { csrfToken: this.csrfService.issue(res) });
        res.status(HttpStatus.OK).type('html').send(renderJobForm(view));
    }

    @Post('job/:id/edit')
    async submitEditForm(
        @Param('id', JobIdPipe) id: number,
        @Req() req: FormRequest,
        @Body() body: Record<string, unknown>,
        @Res() res: HtmlResponse,
    ) {
        const job = await this.jobsService.findJob(id);
        const result = this.validateSubmission(req, body);

        if (!result.success) {
            const view = this.jobsService.buildEditForm(job, {
                csrfToken: this.csrfService.issue(res),
                values: formValuesFromBody(body),
                errors: errorsByField(result.errors),
            });
            res.status(HttpStatus.OK).type('html').send(renderJobForm(view));
            return;
        }

        await this.jobsService.updateJob(id, result.value);
        res.redirect(HttpStatus.FOUND, `/job/${id}`);
    }

    private validateSubmission(req: FormRequest, body: Record<string, unknown>): JobFormValidationResult {
        const result = validateJobApplicationForm(body);
        if (this.csrfService.verify(req, body[CSRF_FIELD])) {
            return result;
        }

        const errors = result.success ? [] : result.errors;
        return { success: false, errors: [{ field: CSRF_FIELD, message: CSRF_ERROR }, ...errors] };
    }
}
