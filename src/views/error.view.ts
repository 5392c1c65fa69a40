import { escapeHtml } from '../lib/html';
import { renderLayout } from './layout';

export interface ErrorPageView {
    status: number;
    title: string;
    message: string;
}

export function renderErrorPage(view: ErrorPageView): string {
    const body = `    <p class="status">${escapeHtml(view.status)}</p>
    <p>${escapeHtml(view.message)}</p>
    <p><a href="/">Back to the dashboard</a></p>`;
    return renderLayout(view.title, body);
}
