import { escapeHtml } from '../../lib/html';
import { renderLayout } from '../../views/layout';
import { JobFormField } from '../job-application.constants';
import { JobFormView } from '../interfaces/job-views.interface';

interface FieldSpec {
    name: JobFormField;
    label: string;
    input: 'date' | 'text' | 'url' | 'textarea' | 'status' | 'resume';
}

const FIELDS: FieldSpec[] = [
    { name: 'application_date', label: 'Application Date', input: 'date' },
    { name: 'status', label: 'Status', input: 'status' },
    { name: 'company', label: 'Company Name', input: 'text' },
    { name: 'position', label: 'Job Title', input: 'text' },
    { name: 'resume_used', label: 'Resume Used', input: 'resume' },
    { name: 'job_url', label: 'Job URL', input: 'url' },
    { name: 'job_description', label: 'Job Description', input: 'textarea' },
    { name: 'notes', label: 'Notes', input: 'textarea' },
    { name: 'salary', label: 'Salary', input: 'text' },
];

export function renderJobForm(view: JobFormView): string {
    const fields = FIELDS.map((field) => renderField(field, view)).join('\n');
    const formError = view.errors.csrf_token
        ? `\n    <p class="error" data-field="csrf_token">${escapeHtml(view.errors.csrf_token)}</p>`
        : '';
    const submitLabel = view.mode === 'add' ? 'Add Job' : 'Save Changes';
    const cancelHref = view.jobId === null ? '/jobs' : `/job/${view.jobId}`;

    const body = `${formError}
    <form method="post" action="${escapeHtml(view.action)}" novalidate>
      <input type="hidden" name="csrf_token" value="${escapeHtml(view.csrfToken)}">
${fields}
      <button type="submit">${submitLabel}</button>
      <a href="${cancelHref}">Cancel</a>
    </form>`;

    return renderLayout(view.title, body);
}

function renderField(field: FieldSpec, view: JobFormView): string {
    const value = view.values[field.name];
    const error = view.errors[field.name];
    const id = `field-${field.name}`;

    return `      <div class="field${error ? ' has-error' : ''}">
        <label for="${id}">${escapeHtml(field.label)}</label>
        ${renderInput(field, id, value, view)}${
            error ? `\n        <span class="error" data-field="${field.name}">${escapeHtml(error)}</span>` : ''
        }
      </div>`;
}

function renderInput(field: FieldSpec, id: string, value: string, view: JobFormView): string {
    switch (field.input) {
        case 'status':
            return renderSelect(field.name, id, value, view.statusChoices);
        case 'resume':
            return renderSelect(field.name, id, value, view.resumeChoices);
        case 'textarea':
            return `<textarea id="${id}" name="${field.name}" rows="5">${escapeHtml(value)}</textarea>`;
        default:
            return `<input type="${field.input}" id="${id}" name="${field.name}" value="${escapeHtml(value)}">`;
    }
}

function renderSelect(name: string, id: string, selected: string, choices: readonly string[]): string {
    const options = choices
        .map(
            (choice) =>
                `<option value="${escapeHtml(choice)}"${choice === selected ? ' selected' : ''}>${escapeHtml(choice)}</option>`,
        )
        .join('');
    return `<select id="${id}" name="${name}">${options}</select>`;
}
