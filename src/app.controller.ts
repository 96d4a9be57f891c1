import {
  Controller,
  Get,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { InjectConnection } from '@nestjs/sequelize';
import { Sequelize } from 'sequelize-typescript';

export interface HealthStatus {
  status: 'ok';
  db: 'up';
}

@Controller()
export class AppController {
  private readonly logger = new Logger(AppController.name);

  constructor(@InjectConnection() private readonly sequelize: Sequelize) {}

  @Get('health')
  async health(): Promise<HealthStatus> {
    try {
      await this.sequelize.authenticate();
    } catch (error: unknown) {
      const reason = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Database health check failed: ${reason.message}`, reason.stack);
      throw new ServiceUnavailableException('Database unavailable');
    }
    return { status: 'ok', db: 'up' };
  }
}
