import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import {
  OPEN_STATUSES,
  TaskEntity,
  TaskStatus,
} from '../entities/task.entity';
import {
  CrawlResultDto,
  TaskStatusDto,
  isCrawlResultDto,
} from '../dto/task-status.dto';
import { ContentCodecService } from '../../common/services/content-codec.service';
import { TaskNotFoundException } from '../task.exceptions';

/**
 * Sole owner of the task table. Every transition is one conditional UPDATE
 * on the current status, so terminal tasks never change again.
 */
@Injectable()
export class TaskStoreService {
  private readonly logger = new Logger(TaskStoreService.name);

  constructor(
    @InjectRepository(TaskEntity)
    private readonly taskRepo: Repository<TaskEntity>,
    private readonly codecService: ContentCodecService,
  ) {}

  async create(url: string, priority: number): Promise<TaskEntity> {
    const task = this.taskRepo.create({
      url,
      priority,
      status: TaskStatus.PENDING,
    });
    return this.taskRepo.save(task);
  }

  markRunning(id: string): Promise<boolean> {
    return this.transition(id, [TaskStatus.PENDING], {
      status: TaskStatus.RUNNING,
      startedAt: new Date(),
    });
  }

  async complete(id: string, result: CrawlResultDto): Promise<boolean> {
    const encoded = await this.codecService.encodeJson(result);
    return this.transition(id, OPEN_STATUSES, {
      status: TaskStatus.COMPLETED,
      completedAt: new Date(),
      compressedResult: encoded.data,
      resultHash: encoded.hash,
      resultSize: encoded.originalSize,
    });
  }

  fail(id: string, error: string): Promise<boolean> {
    return this.transition(id, OPEN_STATUSES, {
      status: TaskStatus.FAILED,
      completedAt: new Date(),
      error,
    });
  }

  async get(id: string): Promise<TaskStatusDto> {
    const task = await this.taskRepo.findOne({ where: { id } });
    if (!task) {
      throw new TaskNotFoundException(id);
    }

    const snapshot: TaskStatusDto = {
      task_id: task.id,
      status: task.status,
      created_at: task.createdAt.toISOString(),
    };
    if (task.status === TaskStatus.COMPLETED && task.compressedResult) {
      snapshot.result = await this.decodeResult(task);
    }
    if (task.status === TaskStatus.FAILED) {
      snapshot.error = task.error ?? 'Unknown error';
    }
    return snapshot;
  }

  private async transition(
    id: string,
    from: readonly TaskStatus[],
    changes: QueryDeepPartialEntity<TaskEntity>,
  ): Promise<boolean> {
    const result = await this.taskRepo.update({ id, status: In([...from]) }, changes);
    if (result.affected === 0) {
      this.logger.warn(
        `Ignored transition of task ${id} to ${String(changes.status)}: not in ${from.join('/')}`,
      );
      return false;
    }
    return true;
  }

  private async decodeResult(task: TaskEntity): Promise<CrawlResultDto> {
    const buffer = task.compressedResult ?? Buffer.alloc(0);
    const decoded = await this.codecService.decodeJson(buffer, task.resultHash);
    if (!isCrawlResultDto(decoded)) {
      throw new Error(`Stored result of task ${task.id} is malformed`);
    }
    return decoded;
  }
}
