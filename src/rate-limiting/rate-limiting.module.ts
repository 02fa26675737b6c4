import { Global, Module } from '@nestjs/common';

import { BottleneckRateLimiterService } from './bottleneck-rate-limiter.service';

// One limiter set per process: the CoinGecko limiter is shared by every monitor.
@Global()
@Module({
  providers: [BottleneckRateLimiterService],
  exports: [BottleneckRateLimiterService],
})
export class RateLimitingModule {}
