import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Request } from 'express';
import { renderErrorPage } from '../../views/error.view';
import { HtmlResponse } from '../http.types';

const TITLES: Record<number, string> = {
    [HttpStatus.BAD_REQUEST]: 'Bad Request',
    [HttpStatus.NOT_FOUND]: 'Not Found',
    [HttpStatus.INTERNAL_SERVER_ERROR]: 'Internal Server Error',
};

@Catch()
export class HtmlExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(HtmlExceptionFilter.name);

    catch(exception: unknown, host: ArgumentsHost) {
        const http = host.switchToHttp();
        const req = http.getRequest<Pick<Request, 'method' | 'originalUrl'>>();
        const res = http.getResponse<HtmlResponse>();

        let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
        let message = 'Something went wrong while handling this request.';

        if (exception instanceof HttpException) {
            status = exception.getStatus();
            message = exception.message;
        }

        if (status >= 500) {
            this.logger.error(
                `${req.method} ${req.originalUrl} failed`,
                exception instanceof Error ? exception.stack : String(exception),
            );
        }

        res.status(status)
            .type('html')
            .send(
                renderErrorPage({
                    status,
                    title: TITLES[status] ?? 'Error',
                    message,
                }),
            );
    }
}
