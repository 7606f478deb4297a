import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TenancyModule } from '../tenancy/tenancy.module';
import { TenantModule } from '../tenant/tenant.module';
import { MetricsCacheService } from './cache/metrics-cache.service';
import { DashboardController } from './dashboard.controller';
import { DashboardService } from './dashboard.service';
import { DashboardCacheInvalidator } from './notifications/dashboard-cache-invalidator';
import { PeriodResolverService } from './period/period-resolver.service';
import { DashboardPreference } from './preferences/dashboard-preference.entity';
import { DashboardPreferenceService } from './preferences/dashboard-preference.service';

@Module({
  imports: [TypeOrmModule.forFeature([DashboardPreference]), TenancyModule, TenantModule],
  controllers: [DashboardController],
  providers: [
    MetricsCacheService,
    PeriodResolverService,
    DashboardPreferenceService,
    DashboardService,
    DashboardCacheInvalidator,
  ],
  exports: [DashboardService],
})
export class DashboardModule {}
