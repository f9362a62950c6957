import type { Clock } from '@/lib/clock';
import type { Database } from '@/lib/database';
import type { NewRecord, Settings } from '@/lib/types';
import { ENTITY_DEFINITIONS } from '../schema';
import { BaseRepository, type EntityInput, type SyncFields } from './BaseRepository';

/**
 * One settings row per owner. Duplicates created on separate devices are merged by sync.
 */
export class SettingsRepository extends BaseRepository<Settings> {
  constructor(db: Database, clock?: Clock) {
    super(db, ENTITY_DEFINITIONS.settings, clock);
  }

  protected compose(input: EntityInput<Settings>, sync: SyncFields): NewRecord<Settings> {
    return { ...input, ...sync };
  }

  async get(): Promise<Settings | null> {
    const [settings] = await this.getAll();
    return settings ?? null;
  }

  async getOrCreate(): Promise<Settings> {
    return (await this.get()) ?? this.create({ monthly_income: 0, has_completed_onboarding: 0 });
  }

  async setMonthlyIncome(amount: number): Promise<Settings | null> {
    const settings = await this.getOrCreate();
    return this.update(settings.id, { monthly_income: amount });
  }

  async completeOnboarding(): Promise<Settings | null> {
    const settings = await this.getOrCreate();
    return this.update(settings.id, { has_completed_onboarding: 1 });
  }
}
