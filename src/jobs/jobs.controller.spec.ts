import { ConflictException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { JobsController } from './jobs.controller';
import { JobsService } from './jobs.service';

describe('JobsController', () => {
  let controller: JobsController;
  let jobsService: { runSignalCycle: jest.Mock; runDailySummary: jest.Mock };

  beforeEach(async () => {
    jobsService = {
      runSignalCycle: jest.fn(),
      runDailySummary: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [JobsController],
      providers: [
        {
          provide: JobsService,
          useValue: jobsService,
        },
      ],
    }).compile();

    controller = module.get<JobsController>(JobsController);
  });

  it('returns the cycle outcome', async () => {
    const outcome = { status: 'skipped', reason: 'fetch-failed', detail: 'yahoo: HTTP 429', at: '2026-01-07T05:00:00.000Z' };
    jobsService.runSignalCycle.mockResolvedValue(outcome);

    await expect(controller.runSignalCycle()).resolves.toEqual(outcome);
  });

  it('answers 409 while a cycle is already running', async () => {
    jobsService.runSignalCycle.mockResolvedValue({
      status: 'skipped',
      reason: 'in-progress',
      detail: 'signal cycle already running',
      at: '2026-01-07T05:00:00.000Z',
    });

    await expect(controller.runSignalCycle()).rejects.toThrow(ConflictException);
  });

  it('answers 409 while a summary is already running', async () => {
    jobsService.runDailySummary.mockResolvedValue({
      status: 'skipped',
      reason: 'in-progress',
      detail: 'daily summary already running',
      at: '2026-01-07T05:00:00.000Z',
    });

    await expect(controller.runDailySummary()).rejects.toThrow('daily summary already running');
  });
});
