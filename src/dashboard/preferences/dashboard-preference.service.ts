import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { Actor } from '../../authorization/actor';
import { ReportsErrors } from '../../common/errors/report.errors';
import { InvalidPeriodException } from '../../common/exceptions/report.exceptions';
import { ALL_WIDGETS, DashboardWidget } from '../dashboard.types';
import { DEFAULT_PERIOD, PeriodName, PresetPeriodName } from '../period/period';
import { DashboardPreference } from './dashboard-preference.entity';

const WIDGETS = new Set<string>(ALL_WIDGETS);

const PG_UNIQUE_VIOLATION = '23505';

function isUniqueViolation(err: unknown): boolean {
  if (!(err instanceof QueryFailedError)) return false;
  const driverError: unknown = err.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === PG_UNIQUE_VIOLATION
  );
}

function isWidget(value: string): value is DashboardWidget {
  return WIDGETS.has(value);
}

/** Layout settings of the calling user. No method touches another user's row. */
@Injectable()
export class DashboardPreferenceService {
  private readonly logger = new Logger(DashboardPreferenceService.name);

  constructor(
    @InjectRepository(DashboardPreference)
    private readonly preferenceRepo: Repository<DashboardPreference>,
  ) {}

  async getOrCreate(actor: Actor): Promise<DashboardPreference> {
    const existing = await this.preferenceRepo.findOne({ where: { userId: actor.id } });
    if (existing) {
      return existing;
    }

    const created = this.preferenceRepo.create({
      userId: actor.id,
      widgetOrder: [],
      hiddenWidgets: [],
      defaultTimePeriod: DEFAULT_PERIOD,
      createdById: actor.id,
      updatedById: actor.id,
    });
    try {
      return await this.preferenceRepo.save(created);
    } catch (err) {
      // a concurrent first load inserted the row
      if (!isUniqueViolation(err)) throw err;
      const winner = await this.preferenceRepo.findOne({ where: { userId: actor.id } });
      if (!winner) throw err;
      return winner;
    }
  }

  async updateWidgetOrder(actor: Actor, widgetOrder: string[]): Promise<DashboardPreference> {
    const unknown = widgetOrder.filter((w) => !isWidget(w));
    if (unknown.length) {
      throw new BadRequestException({ ...ReportsErrors.UNKNOWN_WIDGET, details: { widgets: unknown } });
    }
    if (new Set(widgetOrder).size !== widgetOrder.length) {
      throw new BadRequestException(ReportsErrors.DUPLICATE_WIDGET);
    }

    return this.mutate(actor, (pref) => {
      pref.widgetOrder = [...widgetOrder];
    });
  }

  async toggleWidgetVisibility(actor: Actor, widget: string): Promise<DashboardPreference> {
    if (!isWidget(widget)) {
      throw new BadRequestException({ ...ReportsErrors.UNKNOWN_WIDGET, details: { widgets: [widget] } });
    }

    return this.mutate(actor, (pref) => {
      pref.hiddenWidgets = pref.hiddenWidgets.includes(widget)
        ? pref.hiddenWidgets.filter((w) => w !== widget)
        : [widget, ...pref.hiddenWidgets];
    });
  }

  async setDefaultPeriod(actor: Actor, period: PeriodName): Promise<DashboardPreference> {
    // a custom range has no dates to remember
    if (period === PeriodName.CUSTOM) {
      throw new InvalidPeriodException('custom cannot be the default period');
    }
    const preset: PresetPeriodName = period;
    return this.mutate(actor, (pref) => {
      pref.defaultTimePeriod = preset;
    });
  }

  async resetLayout(actor: Actor): Promise<DashboardPreference> {
    return this.mutate(actor, (pref) => {
      pref.widgetOrder = [];
      pref.hiddenWidgets = [];
    });
  }

  /** Widgets in the user's order, then the rest in default order, without hidden ones. */
  layoutOf(pref: DashboardPreference): DashboardWidget[] {
    const ordered = pref.widgetOrder.filter(isWidget);
    const rest = ALL_WIDGETS.filter((w) => !ordered.includes(w));
    return [...ordered, ...rest].filter((w) => !pref.hiddenWidgets.includes(w));
  }

  private async mutate(
    actor: Actor,
    change: (pref: DashboardPreference) => void,
  ): Promise<DashboardPreference> {
    const pref = await this.getOrCreate(actor);
    change(pref);
    pref.updatedById = actor.id;
    const saved = await this.preferenceRepo.save(pref);

    this.logger.log(['preferences_updated', `user=${actor.id}`].join(' | '));
    return saved;
  }
}
