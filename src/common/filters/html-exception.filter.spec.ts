import { NotFoundException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { createMockResponse, sentBody } from '../../../test/http-mocks';
import { StorageError } from '../../database/storage.error';
import { HtmlExceptionFilter } from './html-exception.filter';

describe('HtmlExceptionFilter', () => {
    const filter = new HtmlExceptionFilter();
    const req = { method: 'GET', originalUrl: '/job/5' };

    it('renders HTTP exceptions with their status', () => {
        const res = createMockResponse();

        filter.catch(new NotFoundException('Job application 5 was not found.'), new ExecutionContextHost([req, res]));

        expect(res.status).toHaveBeenCalledWith(404);
        expect(res.type).toHaveBeenCalledWith('html');
        expect(sentBody(res)).toContain('<title>Not Found | Job Tracker</title>');
        expect(sentBody(res)).toContain('<p>Job application 5 was not found.</p>');
    });

    it('turns storage failures into a 500 page without leaking details', () => {
        const res = createMockResponse();

        filter.catch(new StorageError('connect ECONNREFUSED 127.0.0.1:3306'), new ExecutionContextHost([req, res]));

        expect(res.status).toHaveBeenCalledWith(500);
        expect(sentBody(res)).toContain('<title>Internal Server Error | Job Tracker</title>');
        expect(sentBody(res)).toContain('<p>Something went wrong while handling this request.</p>');
    });
});
