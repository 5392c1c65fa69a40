import { formatTimestamp } from '../../lib/dates';
import { escapeHtml } from '../../lib/html';
import { renderLayout } from '../../views/layout';
import { JobDetailsView } from '../interfaces/job-views.interface';

export function renderJobDetails(view: JobDetailsView): string {
    const { job } = view;

    const jobUrl = renderJobUrl(job.job_url);

    const rows: Array<[string, string]> = [
        ['Application Date', escapeHtml(job.application_date)],
        ['Status', escapeHtml(job.status)],
        ['Company', escapeHtml(job.company)],
        ['Position', escapeHtml(job.position)],
        ['Resume Used', escapeHtml(job.resume_used)],
        ['Job URL', jobUrl],
        ['Salary', escapeHtml(job.salary)],
        ['Job Description', multiline(job.job_description)],
        ['Notes', multiline(job.notes)],
        ['Added', escapeHtml(formatTimestamp(job.created_at))],
    ];

    const body = `    <dl class="details">
${rows.map(([label, value]) => `      <dt>${label}</dt>\n      <dd>${value || '&mdash;'}</dd>`).join('\n')}
    </dl>
    <p><a href="/job/${job.id}/edit">Edit</a> | <a href="/jobs">Back to jobs</a></p>`;

    return renderLayout(view.title, body);
}

// Only web addresses become links; anything else is shown as text
function renderJobUrl(url: string | null): string {
    if (!url || !/^https?:\/\//i.test(url.trim())) {
        return escapeHtml(url);
    }
    return `<a href="${escapeHtml(url)}" rel="noopener noreferrer">${escapeHtml(url)}</a>`;
}

function multiline(value: string | null): string {
    return escapeHtml(value).replace(/\r?\n/g, '<br>');
}
