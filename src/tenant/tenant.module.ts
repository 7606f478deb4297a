import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuditModule } from '../audit/audit.module';
import { TenantsController } from './tenant.controller';
import { Tenant } from './tenant.entity';
import { TenantsService } from './tenant.service';
import { TenantSettingsSource } from './tenant-settings.source';

@Module({
  imports: [TypeOrmModule.forFeature([Tenant]), AuditModule],
  controllers: [TenantsController],
  providers: [
    TenantsService,
    { provide: TenantSettingsSource, useExisting: TenantsService },
  ],
  exports: [TenantsService, TenantSettingsSource],
})
export class TenantModule {}
