import { Column, Entity, Index } from 'typeorm';
import { AuditableEntity } from '../common/entity/auditable-base.entity';

/** Append-only record of a mutating operation. */
@Entity({ name: 'audit_logs' })
@Index('idx_audit_logs_tenant_created', ['tenantId', 'createdAt'])
export class AuditLog extends AuditableEntity {
  @Column({ type: 'uuid', nullable: true })
  tenantId!: string | null;

  @Column({ type: 'uuid', nullable: true })
  userId!: string | null;

  // e.g. stock_in.create, product.update, user.deactivate
  @Column()
  action!: string;

  @Column()
  resourceType!: string;

  @Column({ type: 'uuid', nullable: true })
  resourceId!: string | null;

  @Column({ type: 'jsonb', default: () => "'{}'" })
  changes!: Record<string, unknown>;

  @Column({ type: 'varchar', nullable: true })
  ipAddress!: string | null;

  @Column({ type: 'varchar', nullable: true })
  userAgent!: string | null;
}
