import { escapeHtml, urlWithQuery } from '../../lib/html';
import { renderLayout } from '../../views/layout';
import { DashboardView } from '../interfaces/job-views.interface';
import { renderJobTable } from './job-table.view';

export function renderDashboard(view: DashboardView): string {
    const statusItems = Object.entries(view.statuses)
        .map(
            ([status, count]) =>
                `<li><a href="${escapeHtml(urlWithQuery('/jobs', { status }))}">${escapeHtml(status)}</a>: ${count}</li>`,
        )
        .join('\n      ');

    const body = `    <p class="total">Total applications: <strong>${view.totalJobs}</strong></p>
    <h2>By status</h2>
    <ul class="statuses">
      ${statusItems}
    </ul>
    <h2>Recent applications</h2>
${renderJobTable(view.recentJobs, 'No applications yet.')}`;

    return renderLayout(view.title, body);
}
