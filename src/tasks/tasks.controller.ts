import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { TaskSchedulerService } from './services/task-scheduler.service';
import { CrawlRequestDto } from './dto/crawl-request.dto';
import { TaskStatusDto } from './dto/task-status.dto';
import { ApiTokenGuard } from '../common/guards/api-token.guard';

@Controller()
@UseGuards(ApiTokenGuard)
export class TasksController {
  constructor(private readonly taskScheduler: TaskSchedulerService) {}

  @Post('crawl')
  @HttpCode(HttpStatus.OK)
  async submitCrawl(
    @Body() crawlRequestDto: CrawlRequestDto,
  ): Promise<{ task_id: string }> {
    const taskId = await this.taskScheduler.submit(crawlRequestDto);
    return { task_id: taskId };
  }

  @Get('task/:id')
  async getTask(@Param('id') id: string): Promise<TaskStatusDto> {
    return this.taskScheduler.getStatus(id);
  }
}
