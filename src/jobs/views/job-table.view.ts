import { escapeHtml } from '../../lib/html';
import { JobApplication } from '../interfaces/job-application.interface';

export function renderJobTable(jobs: JobApplication[], emptyMessage: string): string {
    if (jobs.length === 0) {
        return `    <p class="empty">${escapeHtml(emptyMessage)}</p>`;
    }

    const rows = jobs
        .map(
            (job) => `
        <tr>
          <td>${escapeHtml(job.application_date)}</td>
          <td><a href="/job/${job.id}">${escapeHtml(job.company)}</a></td>
          <td>${escapeHtml(job.position)}</td>
          <td>${escapeHtml(job.status)}</td>
        </tr>`,
        )
        .join('');

    return `    <table class="jobs">
      <thead>
        <tr><th>Applied</th><th>Company</th><th>Position</th><th>Status</th></tr>
      </thead>
      <tbody>${rows}
      </tbody>
    </table>`;
}
