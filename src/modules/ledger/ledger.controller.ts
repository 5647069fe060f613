import {
  BadRequestException,
  Controller,
  Get,
  Headers,
  Inject,
  Query,
} from '@nestjs/common';
import { REQUEST_LEDGER, RequestLedger } from './request-ledger.interface';
import { UsageQueryDto } from './ledger.dto';
import { UsageStats, summarizeUsage } from './usage-stats';
import { CatalogService } from '../catalog/catalog.service';

@Controller('forecast/usage')
export class LedgerController {
  constructor(
    @Inject(REQUEST_LEDGER)
    private readonly ledger: RequestLedger,
    private readonly catalogService: CatalogService,
  ) {}

  /**
   * Usage statistics for the calling user, totalled in the base currency
   */
  @Get('stats')
  async getUsageStats(
    @Query() query: UsageQueryDto,
    @Headers('x-user-id') userId?: string,
  ): Promise<UsageStats> {
    if (!userId) {
      throw new BadRequestException('x-user-id header is required');
    }

    const records = await this.ledger.findForUser(userId);
    return summarizeUsage(
      records,
      query.limit ?? 10,
      this.catalogService.snapshot().pricing,
    );
  }
}
