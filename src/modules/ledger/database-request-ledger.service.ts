import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { WeatherRequest } from './weather-request.entity';
import {
  RequestLedger,
  StoredWeatherRequest,
  WeatherRequestRecord,
} from './request-ledger.interface';

@Injectable()
export class DatabaseRequestLedger implements RequestLedger {
  private readonly logger = new Logger(DatabaseRequestLedger.name);

  constructor(
    @InjectRepository(WeatherRequest)
    private readonly weatherRequestRepository: Repository<WeatherRequest>,
  ) {}

  async record(entry: WeatherRequestRecord): Promise<void> {
    await this.weatherRequestRepository.save(
      this.weatherRequestRepository.create({
        userId: entry.userId ?? null,
        apiKeyId: entry.apiKeyId ?? null,
        locations: entry.locations,
        variables: entry.variables,
        timestamp: entry.timestamp,
        timezone: entry.timezone,
        endpointsCalled: entry.endpointsCalled,
        responseStatus: entry.responseStatus,
        responseTime: entry.responseTime,
        success: entry.success,
        errorMessage: entry.errorMessage ?? null,
        totalCost: entry.totalCost,
        currency: entry.currency,
        taxAmount: entry.taxAmount,
        finalAmount: entry.finalAmount,
        ipAddress: entry.ipAddress ?? null,
        userAgent: entry.userAgent ?? null,
      }),
    );

    this.logger.debug(
      `Recorded ${entry.success ? 'successful' : 'failed'} request for ${entry.locations.length} locations`,
    );
  }

  async findForUser(userId: string): Promise<StoredWeatherRequest[]> {
    const rows = await this.weatherRequestRepository.find({
      where: { userId },
      order: { createdAt: 'DESC' },
    });

    return rows.map((row) => ({
      id: row.id,
      createdAt: row.createdAt,
      userId: row.userId ?? undefined,
      apiKeyId: row.apiKeyId ?? undefined,
      locations: row.locations,
      variables: row.variables,
      timestamp: row.timestamp,
      timezone: row.timezone,
      endpointsCalled: row.endpointsCalled,
      responseStatus: row.responseStatus,
      responseTime: row.responseTime,
      success: row.success,
      errorMessage: row.errorMessage ?? undefined,
      totalCost: row.totalCost,
      currency: row.currency,
      taxAmount: row.taxAmount,
      finalAmount: row.finalAmount,
      ipAddress: row.ipAddress ?? undefined,
      userAgent: row.userAgent ?? undefined,
    }));
  }
}
