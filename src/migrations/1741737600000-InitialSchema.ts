import { MigrationInterface, QueryRunner } from 'typeorm';

const AUDIT_COLUMNS = `
  "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
  "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
  "createdById" uuid,
  "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
  "updatedById" uuid`;

const MOVEMENT_TABLES = ['stock_ins', 'stock_outs'] as const;

export class InitialSchema1741737600000 implements MigrationInterface {
  name = 'InitialSchema1741737600000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    await queryRunner.query(`
      CREATE TABLE "tenants" (${AUDIT_COLUMNS},
        "name" character varying NOT NULL,
        "slug" character varying NOT NULL,
        "contactEmail" character varying,
        "contactPhone" character varying,
        "isActive" boolean NOT NULL DEFAULT true,
        "settings" jsonb NOT NULL DEFAULT '{}',
        CONSTRAINT "UQ_tenants_slug" UNIQUE ("slug"),
        CONSTRAINT "PK_tenants" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(
      `CREATE TYPE "users_role_enum" AS ENUM ('super_admin', 'company_admin', 'operator', 'viewer')`,
    );
    await queryRunner.query(`CREATE TYPE "users_status_enum" AS ENUM ('active', 'inactive')`);
    await queryRunner.query(`
      CREATE TABLE "users" (${AUDIT_COLUMNS},
        "tenantId" uuid,
        "email" character varying NOT NULL,
        "name" character varying NOT NULL,
        "role" "users_role_enum" NOT NULL DEFAULT 'viewer',
        "status" "users_status_enum" NOT NULL DEFAULT 'active',
        "lastLoginAt" TIMESTAMP WITH TIME ZONE,
        CONSTRAINT "UQ_users_email" UNIQUE ("email"),
        CONSTRAINT "PK_users" PRIMARY KEY ("id"),
        CONSTRAINT "FK_users_tenant" FOREIGN KEY ("tenantId") REFERENCES "tenants"("id"),
        CONSTRAINT "CHK_users_role_tenant" CHECK (("role" = 'super_admin') = ("tenantId" IS NULL))
      )
    `);
    await queryRunner.query(`CREATE INDEX "idx_users_tenant" ON "users" ("tenantId")`);

    await queryRunner.query(`
      CREATE TABLE "products" (${AUDIT_COLUMNS},
        "tenantId" uuid NOT NULL,
        "name" character varying NOT NULL,
        "sku" character varying NOT NULL,
        "category" character varying NOT NULL DEFAULT 'Paddy',
        "unit" character varying NOT NULL DEFAULT 'quintal',
        "pricePerQuintal" numeric(12,2) NOT NULL CHECK ("pricePerQuintal" > 0),
        "description" character varying,
        "isActive" boolean NOT NULL DEFAULT true,
        CONSTRAINT "uq_products_tenant_sku" UNIQUE ("tenantId", "sku"),
        CONSTRAINT "PK_products" PRIMARY KEY ("id"),
        CONSTRAINT "FK_products_tenant" FOREIGN KEY ("tenantId") REFERENCES "tenants"("id")
      )
    `);
    await queryRunner.query(`CREATE INDEX "idx_products_tenant" ON "products" ("tenantId")`);

    for (const table of MOVEMENT_TABLES) {
      await queryRunner.query(`
        CREATE TABLE "${table}" (${AUDIT_COLUMNS},
          "tenantId" uuid NOT NULL,
          "productId" uuid NOT NULL,
          "date" date NOT NULL,
          "partyName" character varying NOT NULL,
          "partyContact" character varying,
          "vehicleNumber" character varying,
          "numOfBags" integer NOT NULL CHECK ("numOfBags" > 0),
          "netWeightPerBagKg" numeric(10,2) NOT NULL CHECK ("netWeightPerBagKg" > 0),
          "totalQuintals" numeric(14,4) NOT NULL,
          "pricePerQuintal" numeric(12,2) NOT NULL CHECK ("pricePerQuintal" > 0),
          "totalPrice" numeric(20,6) NOT NULL,
          "notes" character varying,
          CONSTRAINT "PK_${table}" PRIMARY KEY ("id"),
          CONSTRAINT "FK_${table}_tenant" FOREIGN KEY ("tenantId") REFERENCES "tenants"("id"),
          CONSTRAINT "FK_${table}_product" FOREIGN KEY ("productId") REFERENCES "products"("id")
        )
      `);
      await queryRunner.query(
        `CREATE INDEX "idx_${table}_tenant_date" ON "${table}" ("tenantId", "date" DESC)`,
      );
      await queryRunner.query(
        `CREATE INDEX "idx_${table}_tenant_party" ON "${table}" ("tenantId", "partyName")`,
      );
      await queryRunner.query(
        `CREATE INDEX "idx_${table}_tenant_product" ON "${table}" ("tenantId", "productId")`,
      );
      await queryRunner.query(
        `CREATE INDEX "idx_${table}_tenant_created" ON "${table}" ("tenantId", "createdAt" DESC)`,
      );
    }

    await queryRunner.query(`
      CREATE TABLE "audit_logs" (${AUDIT_COLUMNS},
        "tenantId" uuid,
        "userId" uuid,
        "action" character varying NOT NULL,
        "resourceType" character varying NOT NULL,
        "resourceId" uuid,
        "changes" jsonb NOT NULL DEFAULT '{}',
        "ipAddress" character varying,
        "userAgent" character varying,
        CONSTRAINT "PK_audit_logs" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "idx_audit_logs_tenant_created" ON "audit_logs" ("tenantId", "createdAt")`,
    );

    await queryRunner.query(`
      CREATE TABLE "dashboard_preferences" (${AUDIT_COLUMNS},
        "userId" uuid NOT NULL,
        "widgetOrder" text array NOT NULL DEFAULT '{}',
        "hiddenWidgets" text array NOT NULL DEFAULT '{}',
        "defaultTimePeriod" character varying(32) NOT NULL DEFAULT 'this_month',
        CONSTRAINT "UQ_dashboard_preferences_user" UNIQUE ("userId"),
        CONSTRAINT "PK_dashboard_preferences" PRIMARY KEY ("id"),
        CONSTRAINT "FK_dashboard_preferences_user" FOREIGN KEY ("userId")
          REFERENCES "users"("id") ON DELETE CASCADE
      )
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE "dashboard_preferences"`);
    await queryRunner.query(`DROP TABLE "audit_logs"`);
    for (const table of [...MOVEMENT_TABLES].reverse()) {
      await queryRunner.query(`DROP TABLE "${table}"`);
    }
    await queryRunner.query(`DROP TABLE "products"`);
    await queryRunner.query(`DROP TABLE "users"`);
    await queryRunner.query(`DROP TYPE "users_status_enum"`);
    await queryRunner.query(`DROP TYPE "users_role_enum"`);
    await queryRunner.query(`DROP TABLE "tenants"`);
  }
}
