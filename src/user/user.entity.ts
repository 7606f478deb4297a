import { Column, Entity, Index, JoinColumn, ManyToOne } from 'typeorm';
import { Tenant } from '../tenant/tenant.entity';
import { AuditableEntity } from '../common/entity/auditable-base.entity';

export enum UserRole {
  SUPER_ADMIN = 'super_admin', // platform operator, no tenant
  COMPANY_ADMIN = 'company_admin', // manages one tenant
  OPERATOR = 'operator', // records stock movements
  VIEWER = 'viewer', // read-only reports, no financials
}

export enum UserStatus {
  ACTIVE = 'active',
  INACTIVE = 'inactive',
}

@Entity({ name: 'users' })
@Index('idx_users_tenant', ['tenantId'])
export class User extends AuditableEntity {
  // null only for super admins
  @Column({ type: 'uuid', nullable: true })
  tenantId!: string | null;

  @ManyToOne(() => Tenant, { nullable: true })
  @JoinColumn({ name: 'tenantId' })
  tenant?: Tenant | null;

  @Column({ unique: true })
  email!: string;

  @Column()
  name!: string;

  @Column({ type: 'enum', enum: UserRole, default: UserRole.VIEWER })
  role!: UserRole;

  @Column({ type: 'enum', enum: UserStatus, default: UserStatus.ACTIVE })
  status!: UserStatus;

  @Column({ type: 'timestamptz', nullable: true })
  lastLoginAt?: Date | null;
}
