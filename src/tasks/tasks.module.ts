import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TaskEntity } from './entities/task.entity';
import { TasksController } from './tasks.controller';
import { TaskStoreService } from './services/task-store.service';
import { TaskSchedulerService } from './services/task-scheduler.service';
import { CommonModule } from '../common/common.module';
import { CrawlerModule } from '../crawler/crawler.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([TaskEntity]),
    CommonModule,
    CrawlerModule,
  ],
  controllers: [TasksController],
  providers: [TaskStoreService, TaskSchedulerService],
  exports: [TaskSchedulerService],
})
export class TasksModule {}
