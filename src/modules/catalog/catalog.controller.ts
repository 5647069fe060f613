import { Controller, Get } from '@nestjs/common';
import { CatalogService } from './catalog.service';
import { PricingEngine } from '../pricing/pricing-engine.service';
import { ProviderGroup, TierPrices } from './catalog.types';

@Controller('forecast')
export class CatalogController {
  constructor(
    private readonly catalogService: CatalogService,
    private readonly pricingEngine: PricingEngine,
  ) {}

  /**
   * Supported variables with metadata, plus the same names grouped by
   * provider group
   */
  @Get('variables')
  getSupportedVariables(): {
    variables: Array<{
      variableName: string;
      providerGroup: ProviderGroup;
      description: string;
      unit: string;
      dataType: string;
    }>;
    endpoints: Record<ProviderGroup, string[]>;
  } {
    const { catalog } = this.catalogService.snapshot();

    return {
      variables: catalog.list().map((definition) => ({
        variableName: definition.variableName,
        providerGroup: definition.providerGroup,
        description: definition.description ?? '',
        unit: definition.unit,
        dataType: definition.dataType,
      })),
      endpoints: catalog.variablesByGroup(),
    };
  }

  @Get('pricing')
  getPricingInformation() {
    const { catalog, pricing } = this.catalogService.snapshot();

    const entries: Array<{
      variableName: string;
      providerGroup: ProviderGroup | null;
      basePrice: number;
      tierPrices: TierPrices;
      currency: string;
      taxRate: number;
      taxEnabled: boolean;
    }> = Array.from(pricing.variables.values(), (entry) => ({
      variableName: entry.variableName,
      providerGroup: catalog.lookup(entry.variableName) ?? null,
      basePrice: entry.basePrice,
      tierPrices: { ...entry.tierPrices },
      currency: pricing.baseCurrency,
      taxRate: (entry.tax ?? pricing.tax).rate,
      taxEnabled: (entry.tax ?? pricing.tax).enabled,
    }));

    return {
      pricing: entries,
      defaultUnitPrice: pricing.defaultUnitPrice,
      calculationExample: this.pricingEngine.example(pricing),
    };
  }
}
