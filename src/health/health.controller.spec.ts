import { HttpStatus } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { createMockResponse } from '../../test/http-mocks';
import { DatabaseService } from '../database/database.service';
import { HealthController } from './health.controller';

describe('HealthController', () => {
    let controller: HealthController;
    const databaseService = { healthCheck: jest.fn() };

    beforeEach(async () => {
        jest.clearAllMocks();

        const module: TestingModule = await Test.createTestingModule({
            controllers: [HealthController],
            providers: [{ provide: DatabaseService, useValue: databaseService }],
        }).compile();

        controller = module.get<HealthController>(HealthController);
    });

    it('is always live, whatever the store says', () => {
        databaseService.healthCheck.mockResolvedValue(false);

        expect(controller.live()).toBe('OK');
        expect(databaseService.healthCheck).not.toHaveBeenCalled();
    });

    it('is ready when the store answers', async () => {
        databaseService.healthCheck.mockResolvedValue(true);
        const res = createMockResponse();

        await controller.readiness(res);

        expect(res.status).toHaveBeenCalledWith(HttpStatus.OK);
        expect(res.send).toHaveBeenCalledWith('OK');
    });

    it('reports Not Ready with a 500 when the store is unreachable', async () => {
        databaseService.healthCheck.mockResolvedValue(false);
        const res = createMockResponse();

        await controller.readiness(res);

        expect(res.status).toHaveBeenCalledWith(HttpStatus.INTERNAL_SERVER_ERROR);
        expect(res.type).toHaveBeenCalledWith('text');
        expect(res.send).toHaveBeenCalledWith('Not Ready');
    });
});
