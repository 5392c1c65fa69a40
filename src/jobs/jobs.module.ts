import { Module } from '@nestjs/common';
import { CsrfService } from '../common/csrf/csrf.service';
import { DatabaseModule } from '../database/database.module';
import { JobApplicationsRepository } from './job-applications.repository';
import { JobsController } from './jobs.controller';
import { JobsService } from './jobs.service';

@Module({
    imports: [DatabaseModule],
    controllers: [JobsController],
    providers: [JobsService, JobApplicationsRepository, CsrfService],
})
export class JobsModule {}
