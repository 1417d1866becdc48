import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { TaskEntity } from '../tasks/entities/task.entity';

/**
 * The task table lives for one process: the schema is dropped and
 * recreated on every start.
 */
export const typeOrmConfigFactory = (
  configService: ConfigService,
): TypeOrmModuleOptions => {
  const isTest = configService.get('NODE_ENV') === 'test';

  return {
    type: 'sqlite',
    database: isTest
      ? ':memory:'
      : configService.get<string>('DATABASE_PATH', ':memory:'),
    entities: [TaskEntity],
    synchronize: true,
    dropSchema: true,
    logging: configService.get('NODE_ENV') === 'development',
  };
};
