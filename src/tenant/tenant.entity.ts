import { Column, Entity } from 'typeorm';
import { AuditableEntity } from '../common/entity/auditable-base.entity';

export interface TenantSettings {
  default_unit?: string;
  timezone?: string;
  date_format?: string;
  lowStockThreshold?: number;
}

@Entity({ name: 'tenants' })
export class Tenant extends AuditableEntity {
  @Column()
  name!: string;

  // lowercase letters, digits and hyphens
  @Column({ unique: true })
  slug!: string;

  @Column({ nullable: true })
  contactEmail?: string;

  @Column({ nullable: true })
  contactPhone?: string;

  // deactivated instead of deleted
  @Column({ default: true })
  isActive!: boolean;

  @Column({ type: 'jsonb', default: () => "'{}'" })
  settings!: TenantSettings;
}
