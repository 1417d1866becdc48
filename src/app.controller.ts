import { Controller, Get } from '@nestjs/common';
import { TaskSchedulerService } from './tasks/services/task-scheduler.service';

export interface HealthDto {
  status: 'healthy';
  max_concurrent_tasks: number;
  active_tasks: number;
  queued_tasks: number;
  llm_enabled: false;
}

@Controller()
export class AppController {
  constructor(private readonly taskScheduler: TaskSchedulerService) {}

  @Get('health')
  health(): HealthDto {
    return {
      status: 'healthy',
      max_concurrent_tasks: this.taskScheduler.maxConcurrentTasks,
      active_tasks: this.taskScheduler.activeCount,
      queued_tasks: this.taskScheduler.queuedCount,
      llm_enabled: false,
    };
  }
}
