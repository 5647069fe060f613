import { Controller, Get } from '@nestjs/common';
import { ServiceStatus, StatusService } from './status.service';

@Controller('status')
export class StatusController {
  constructor(private readonly statusService: StatusService) {}

  @Get()
  getStatus(): ServiceStatus {
    return this.statusService.getStatus();
  }
}
