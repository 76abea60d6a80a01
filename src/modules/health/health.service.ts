import { Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import { DataSource } from 'typeorm';

export interface HealthStatus {
  status: 'ok';
  service: string;
  database: 'up';
  timestamp: string;
}

@Injectable()
export class HealthService {
  private readonly log = new Logger(HealthService.name);

  constructor(private readonly dataSource: DataSource) {}

  async check(): Promise<HealthStatus> {
    try {
      await this.dataSource.query('SELECT 1');
    } catch (error) {
      this.log.error(`Database ping failed: ${error instanceof Error ? error.message : String(error)}`);
      throw new ServiceUnavailableException({ status: 'error', service: 'course-catalog', database: 'down' });
    }
    return { status: 'ok', service: 'course-catalog', database: 'up', timestamp: new Date().toISOString() };
  }
}
