import { Column, Entity, JoinColumn, OneToOne } from 'typeorm';
import { AuditableEntity } from '../../common/entity/auditable-base.entity';
import { User } from '../../user/user.entity';
import { PeriodName, PresetPeriodName } from '../period/period';

@Entity({ name: 'dashboard_preferences' })
export class DashboardPreference extends AuditableEntity {
  @Column({ type: 'uuid', unique: true })
  userId!: string;

  @OneToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user?: User;

  // widgets missing from the list keep their default position after the listed ones
  @Column({ type: 'text', array: true, default: () => "'{}'" })
  widgetOrder!: string[];

  @Column({ type: 'text', array: true, default: () => "'{}'" })
  hiddenWidgets!: string[];

  @Column({ type: 'varchar', length: 32, default: PeriodName.THIS_MONTH })
  defaultTimePeriod!: PresetPeriodName;
}
