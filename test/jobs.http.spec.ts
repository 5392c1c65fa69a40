import { HttpStatus, INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import cookieParser from 'cookie-parser';
import { CsrfService } from '../src/common/csrf/csrf.service';
import { HtmlExceptionFilter } from '../src/common/filters/html-exception.filter';
import { JobApplicationsRepository } from '../src/jobs/job-applications.repository';
import { JobsController } from '../src/jobs/jobs.controller';
import { JobsService } from '../src/jobs/jobs.service';
import { InMemoryJobApplicationsRepository } from './in-memory-job-applications.repository';

describe('Jobs routes over HTTP', () => {
    let app: INestApplication;
    let baseUrl: string;
    let repository: InMemoryJobApplicationsRepository;

    beforeAll(async () => {
        repository = new InMemoryJobApplicationsRepository();

        const moduleRef = await Test.createTestingModule({
            controllers: [JobsController],
            providers: [
                JobsService,
                CsrfService,
                { provide: JobApplicationsRepository, useValue: repository },
            ],
        }).compile();

        app = moduleRef.createNestApplication();
        app.use(cookieParser('test-secret'));
        app.useGlobalFilters(new HtmlExceptionFilter());
        await app.listen(0, '127.0.0.1');
        baseUrl = await app.getUrl();

        await repository.insert({
            application_date: '2024-01-15',
            status: 'Interviewing',
            company: 'Acme',
            position: 'Engineer',
            resume_used: 'Default Resume',
            job_url: null,
            job_description: null,
            notes: null,
            salary: null,
        });
    });

    afterAll(async () => {
        await app.close();
    });

    it.each(['/job/abc', '/job/abc/edit', '/job/1.5'])('answers %s with the 404 page', async (url) => {
        const res = await fetch(`${baseUrl}${url}`);

        expect(res.status).toBe(HttpStatus.NOT_FOUND);
        expect(res.headers.get('content-type')).toMatch(/^text\/html/);
        expect(await res.text()).toContain('<title>Not Found | Job Tracker</title>');
    });

    it('answers a post to a non-numeric id with 404', async () => {
        const res = await fetch(`${baseUrl}/job/abc/edit`, {
            method: 'POST',
            headers: { 'content-type': 'application/x-www-form-urlencoded' },
            body: new URLSearchParams({ company: 'Acme' }).toString(),
            redirect: 'manual',
        });

        expect(res.status).toBe(HttpStatus.NOT_FOUND);
    });

    it('answers an unknown numeric id with 404', async () => {
        const res = await fetch(`${baseUrl}/job/99`);

        expect(res.status).toBe(HttpStatus.NOT_FOUND);
    });

    it('serves a stored job by id', async () => {
        const res = await fetch(`${baseUrl}/job/1`);

        expect(res.status).toBe(HttpStatus.OK);
        expect(await res.text()).toContain('<title>Acme - Engineer | Job Tracker</title>');
    });

    it('ignores a bracketed status key and lists everything', async () => {
        const res = await fetch(`${baseUrl}/jobs?status[a]=b`);

        expect(res.status).toBe(HttpStatus.OK);
        expect(await res.text()).toContain('<td><a href="/job/1">Acme</a></td>');
    });
});
