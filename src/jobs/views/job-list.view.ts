import { escapeHtml, urlWithQuery } from '../../lib/html';
import { renderLayout } from '../../views/layout';
import { JobListView } from '../interfaces/job-views.interface';
import { renderJobTable } from './job-table.view';

export function renderJobList(view: JobListView): string {
    const links = [
        { label: 'All', href: '/jobs', active: view.statusFilter === null },
        ...view.statusChoices.map((status) => ({
            label: status,
            href: urlWithQuery('/jobs', { status }),
            active: view.statusFilter === status,
        })),
    ]
        .map(
            (link) =>
                `<a href="${escapeHtml(link.href)}"${link.active ? ' class="active"' : ''}>${escapeHtml(link.label)}</a>`,
        )
        .join('\n      ');

    const empty = view.statusFilter
        ? `No applications with status "${view.statusFilter}".`
        : 'No applications yet.';

    const body = `    <nav class="filters">
      ${links}
    </nav>
${renderJobTable(view.jobs, empty)}`;

    return renderLayout(view.title, body);
}
