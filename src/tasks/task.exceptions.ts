import { BadRequestException, NotFoundException } from '@nestjs/common';

/** The request asks for a capability this deployment has switched off. */
export class UnsupportedFeatureException extends BadRequestException {
  constructor(feature: string) {
    super(`${feature} support is currently disabled`);
  }
}

export class TaskNotFoundException extends NotFoundException {
  constructor(taskId: string) {
    super(`Task ${taskId} not found`);
  }
}
