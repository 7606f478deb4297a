import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import { TypeOrmModule } from '@nestjs/typeorm';
import type { Request } from 'express';
import { ClsModule } from 'nestjs-cls';
import { join } from 'path';
import { AuditModule } from './audit/audit.module';
import { AuthModule } from './auth/auth.module';
import { AuthorizationModule } from './authorization/authorization.module';
import { ClockModule } from './common/clock/clock.module';
import { AppContextModule } from './common/context/app-context.module';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { ClsContextInterceptor } from './common/interceptors/cls-context.interceptor';
import { DashboardModule } from './dashboard/dashboard.module';
import { NotificationsModule } from './dashboard/notifications/notifications.module';
import { InventoryModule } from './inventory/inventory.module';
import { ProductModule } from './product/product.module';
import { ReportsModule } from './reports/reports.module';
import { TenancyModule } from './tenancy/tenancy.module';
import { TenantModule } from './tenant/tenant.module';
import { UserModule } from './user/user.module';

function firstHeader(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first?.split(',')[0]?.trim() || undefined;
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),

    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        type: 'postgres',
        host: config.get<string>('DB_HOST'),
        port: Number(config.get<string>('DB_PORT') ?? 5432),
        username: config.get<string>('DB_USER'),
        password: config.get<string>('DB_PASS'),
        database: config.get<string>('DB_NAME'),
        autoLoadEntities: true,
        synchronize: false,
        migrations: [join(__dirname, 'migrations/*.js')],
        migrationsTableName: 'typeorm_migrations',
      }),
    }),

    // request-scoped context for every HTTP route
    ClsModule.forRoot({
      global: true,
      middleware: {
        mount: true,
        setup: (cls, req: Request) => {
          cls.set('ip', firstHeader(req.headers['x-forwarded-for']) ?? req.socket.remoteAddress);
          cls.set('userAgent', req.headers['user-agent']);
          cls.set(
            'correlationId',
            firstHeader(req.headers['x-correlation-id']) ??
              firstHeader(req.headers['x-request-id']) ??
              cls.getId(),
          );
        },
      },
    }),
    AppContextModule,
    ClockModule,
    AuthorizationModule,
    NotificationsModule,
    AuditModule,
    TenancyModule,
    TenantModule,
    UserModule,
    AuthModule,
    ProductModule,
    InventoryModule,
    DashboardModule,
    ReportsModule,
  ],
  providers: [
    {
      provide: APP_INTERCEPTOR,
      useClass: ClsContextInterceptor,
    },
    {
      provide: APP_FILTER,
      useClass: AllExceptionsFilter,
    },
  ],
})
export class AppModule {}
