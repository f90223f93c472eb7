export type ModifierType =
  | 'dead'
  | 'infected'
  | 'pending_rise'
  | 'zombie'
  | 'ghost'
  | 'ghost_pending'
  | 'drunk'
  | 'jester'
  | 'priest'
  | 'resurrection_charge'
  | 'lover'
  | 'pending_heartbreak'
  | 'heartbreak_ready'
  | 'bodyguard'
  | 'guarded'
  | 'gun_nut'
  | 'insomniac'
  | 'insomniac_sighting'
  | 'sleepwalker'
  | 'suicidal'
  | 'protected'
  | 'last_protected'
  | 'vigilante_used'
  | 'truth_serum';

export type ModifierData = Readonly<Record<string, string | number | boolean | null>>;

export interface ModifierInit {
  type: ModifierType;
  source: string;
  data?: ModifierData;
  /** Last day the modifier counts; absent means permanent. */
  expiresOn?: number;
  appliedOn?: number;
  active?: boolean;
}

/** A typed, optionally expiring tag on a player. Instances are immutable. */
export class PlayerModifier {
  readonly type: ModifierType;
  readonly source: string;
  readonly data: ModifierData;
  readonly expiresOn?: number;
  readonly appliedOn: number;
  readonly active: boolean;

  constructor(init: ModifierInit) {
    this.type = init.type;
    this.source = init.source;
    this.data = Object.freeze({ ...(init.data ?? {}) });
    this.expiresOn = init.expiresOn;
    this.appliedOn = init.appliedOn ?? 0;
    this.active = init.active ?? true;
  }

  /** Strict: a modifier expiring on day 2 still counts on day 2. */
  isExpired(day: number): boolean {
    return this.expiresOn !== undefined && day > this.expiresOn;
  }

  isLive(day: number): boolean {
    return this.active && !this.isExpired(day);
  }

  deactivated(): PlayerModifier {
    return new PlayerModifier({ ...this.toInit(), active: false });
  }

  withData(patch: ModifierData): PlayerModifier {
    return new PlayerModifier({ ...this.toInit(), data: { ...this.data, ...patch } });
  }

  str(key: string): string | undefined {
    const v = this.data[key];
    return typeof v === 'string' ? v : undefined;
  }

  num(key: string): number | undefined {
    const v = this.data[key];
    return typeof v === 'number' ? v : undefined;
  }

  flag(key: string): boolean {
    return this.data[key] === true;
  }

  private toInit(): ModifierInit {
    return {
      type: this.type,
      source: this.source,
      data: this.data,
      expiresOn: this.expiresOn,
      appliedOn: this.appliedOn,
      active: this.active,
    };
  }
}
