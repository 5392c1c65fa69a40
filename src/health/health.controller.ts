import { Controller, Get, Header, HttpStatus, Res } from '@nestjs/common';
import { HtmlResponse } from '../common/http.types';
import { DatabaseService } from '../database/database.service';

@Controller('healthz')
export class HealthController {
    constructor(private readonly databaseService: DatabaseService) {}

    @Get('live')
    @Header('Content-Type', 'text/plain; charset=utf-8')
    live(): string {
        return 'OK';
    }

    // Store failures become "not ready" rather than an error page
    @Get('readiness')
    async readiness(@Res() res: HtmlResponse) {
        const isHealthy = await this.databaseService.healthCheck();
        res.status(isHealthy ? HttpStatus.OK : HttpStatus.INTERNAL_SERVER_ERROR)
            .type('text')
            .send(isHealthy ? 'OK' : 'Not Ready');
    }
}
