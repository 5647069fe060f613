import { Injectable, Logger } from '@nestjs/common';
import { readFileSync } from 'fs';
import { join } from 'path';

export interface ServiceStatus {
  status: string;
  version: string;
  timestamp: string;
  uptimeSeconds: number;
}

@Injectable()
export class StatusService {
  private readonly logger = new Logger(StatusService.name);
  private readonly startedAt = Date.now();
  private version: string;

  constructor() {
    try {
      const packageJsonPath = join(process.cwd(), 'package.json');
      const packageJson: unknown = JSON.parse(
        readFileSync(packageJsonPath, 'utf8'),
      );
      this.version =
        typeof packageJson === 'object' &&
        packageJson !== null &&
        'version' in packageJson &&
        typeof packageJson.version === 'string'
          ? packageJson.version
          : 'unknown';
    } catch (error) {
      this.logger.warn(
        `Could not read package version: ${error instanceof Error ? error.message : String(error)}`,
      );
      this.version = 'unknown';
    }
  }

  getStatus(now: Date = new Date()): ServiceStatus {
    return {
      status: 'OK',
      version: this.version,
      timestamp: now.toISOString(),
      uptimeSeconds: Math.floor((now.getTime() - this.startedAt) / 1000),
    };
  }
}
