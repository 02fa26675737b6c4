import { Module } from '@nestjs/common';

import { DashboardReporterService } from './dashboard-reporter.service';
import { AlertsModule } from '../alerts/alerts.module';
import { MonitoringModule } from '../monitoring/monitoring.module';
import { SubscribersModule } from '../subscribers/subscribers.module';

@Module({
  imports: [MonitoringModule, SubscribersModule, AlertsModule],
  providers: [DashboardReporterService],
  exports: [DashboardReporterService],
})
export class DashboardModule {}
