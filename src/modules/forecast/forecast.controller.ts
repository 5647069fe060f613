import {
  BadGatewayException,
  BadRequestException,
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  Inject,
  Ip,
  Post,
} from '@nestjs/common';
import { ForecastService } from './forecast.service';
import { ForecastRequestDto } from './forecast.dto';
import { ForecastCaller, ForecastResponse } from './forecast.types';
import {
  AllProvidersFailedError,
  ForecastValidationError,
  UnknownVariableError,
} from './forecast.errors';
import { FORECAST_CONFIG, ForecastConfig } from '../config/forecast.config';
import { isSubscriptionTier } from '../catalog/catalog.types';

@Controller('forecast')
export class ForecastController {
  constructor(
    private readonly forecastService: ForecastService,
    @Inject(FORECAST_CONFIG)
    private readonly config: ForecastConfig,
  ) {}

  /**
   * Route the requested variables to their provider groups and return one
   * record per location with pricing metadata
   */
  @Post()
  @HttpCode(200)
  async getForecast(
    @Body() body: ForecastRequestDto,
    @Headers() headers: Record<string, string | undefined>,
    @Ip() ipAddress: string,
  ): Promise<ForecastResponse> {
    const tier = headers['x-subscription-tier']?.toLowerCase();
    const caller: ForecastCaller = {
      userId: headers['x-user-id'],
      apiKeyId: headers['x-api-key-id'],
      tier: isSubscriptionTier(tier) ? tier : undefined,
      currency: headers['x-currency']?.toUpperCase(),
      ipAddress,
      userAgent: headers['user-agent'],
    };

    try {
      return await this.forecastService.getForecast(
        {
          coordinates: body.coordinates,
          variables: body.variables,
          timestamp: body.timestamp,
          timezone: body.timezone ?? this.config.defaultTimezone,
        },
        caller,
      );
    } catch (error) {
      if (
        error instanceof ForecastValidationError ||
        error instanceof UnknownVariableError
      ) {
        throw new BadRequestException(error.message);
      }
      if (error instanceof AllProvidersFailedError) {
        throw new BadGatewayException({
          message: error.message,
          failures: error.failures,
        });
      }
      throw error;
    }
  }

  @Get('health')
  getHealth(): {
    status: string;
    timestamp: string;
    endpoints: Record<string, string>;
    mockMode: boolean;
  } {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      endpoints: { ...this.config.providerEndpoints },
      mockMode: this.config.useMockProviders,
    };
  }
}
