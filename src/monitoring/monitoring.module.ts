import { Module } from '@nestjs/common';

import { createNetworkMonitors } from './network-monitor.factory';
import { AppConfigService } from '../config/app-config.service';
import { NETWORK_MONITORS } from '../core/ports/monitors/network-monitor-port.tokens';
import { PRICE_SOURCE_PORT } from '../core/ports/pricing/price-source-port.tokens';
import { ExplorerHttpClient } from '../integrations/explorers/http/explorer-http.client';
import { CoinGeckoPriceSourceAdapter } from '../integrations/pricing/coingecko/coingecko-price-source.adapter';
import { MetricsService } from '../observability/metrics.service';
import { ObservabilityModule } from '../observability/observability.module';

@Module({
  imports: [ObservabilityModule],
  providers: [
    ExplorerHttpClient,
    CoinGeckoPriceSourceAdapter,
    {
      provide: PRICE_SOURCE_PORT,
      useExisting: CoinGeckoPriceSourceAdapter,
    },
    {
      provide: NETWORK_MONITORS,
      inject: [AppConfigService, ExplorerHttpClient, PRICE_SOURCE_PORT, MetricsService],
      useFactory: createNetworkMonitors,
    },
  ],
  exports: [NETWORK_MONITORS],
})
export class MonitoringModule {}
