import type { Narrator } from '../agentIo.js';
import type { Effect } from '../effects/types.js';
import type { PlayerState } from '../players/playerState.js';
import type { EventKind, Phase } from '../types.js';
import type { Rng } from '../utils.js';

/** Read-only slice of a player handed to event hooks. */
export type PlayerView = Readonly<
  Pick<
    PlayerState,
    'name' | 'role' | 'team' | 'alive' | 'personality' | 'displayRole' | 'roleDisplayWithArticle' | 'modifiers'
  >
> &
  Pick<PlayerState, 'hasModifier' | 'getModifier'>;

/** Everything a hook may look at. Hooks never mutate; they return Effects. */
export interface GameView {
  readonly day: number;
  readonly phase: Phase;
  readonly rng: Rng;
  players(): readonly PlayerView[];
  player(name: string): PlayerView | undefined;
  alivePlayers(): PlayerView[];
}

export type EliminationCause =
  | 'assassination'
  | 'vigilante'
  | 'lynch'
  | 'zombie'
  | 'heartbreak'
  | 'suicide'
  | 'counter_attack'
  | 'bodyguard_sacrifice';

export interface Elimination {
  player: string;
  cause: EliminationCause;
  day: number;
  phase: Phase;
}

export type AttackSource = 'assassins' | 'vigilante' | 'zombie';

export interface NightAttack {
  source: AttackSource;
  /** Who carried it out; a counter-attack strikes one of them. */
  attackers: readonly string[];
  target: string;
  /** Doctor and Bodyguard only cover assassinations and vigilante shots. */
  protectable: boolean;
  /** Applied when the attack lands. */
  onHit: Effect[];
}

export interface AttackInterception {
  outcome: 'countered' | 'shielded';
  effects: Effect[];
  summary: string;
}

export interface SetupContext {
  view: GameView;
  /** Alive village players no earlier event has claimed. */
  unclaimed(): PlayerView[];
}

/** For hooks that need a player's decision. */
export interface DecisionContext {
  view: GameView;
  narrator: Narrator;
  contextFor(player: string): string;
}

/**
 * An optional rule module. Lifecycle hooks are required; the rest are
 * capabilities an event opts into and the registry dispatches by presence.
 */
export interface EventModifier {
  readonly kind: EventKind;
  readonly name: string;
  readonly description: string;
  readonly probability: number;
  /** Players this event hands a status to are excluded from later events' pools. */
  readonly claimsPlayers: boolean;

  shouldActivate(rng: Rng): boolean;
  setup(ctx: SetupContext): Effect[];
  onPlayerEliminated(view: GameView, elimination: Elimination): Effect[];
  onNightStart(view: GameView): Effect[];
  onNightEnd(view: GameView): Effect[];

  nightAttackers?(view: GameView): string[];
  planNightAttack?(view: GameView, attacker: string): NightAttack | undefined;
  counterAttack?(view: GameView, attack: NightAttack): AttackInterception | undefined;
  shieldAttack?(view: GameView, attack: NightAttack): AttackInterception | undefined;
  collectNightChoices?(ctx: DecisionContext): Promise<Effect[]>;
  onDayStart?(ctx: DecisionContext): Promise<Effect[]>;
  resolvePendingChoices?(ctx: DecisionContext): Promise<Effect[]>;
  redirectVote?(view: GameView, voter: string, intended: string): string | undefined;
}

export type Eligibility = (player: PlayerView, view: GameView) => boolean;

export interface EventOptions {
  probability?: number;
  /** Extra per-event filter on top of the shared unclaimed pool. */
  eligibility?: Eligibility;
}

export const DEFAULT_EVENT_PROBABILITY = 0.1;

/** Lifecycle defaults: hooks an event doesn't care about return no effects. */
export abstract class BaseEvent implements EventModifier {
  abstract readonly kind: EventKind;
  abstract readonly name: string;
  abstract readonly description: string;
  readonly probability: number;
  readonly claimsPlayers: boolean = true;
  protected readonly eligibility?: Eligibility;

  constructor(opts: EventOptions = {}) {
    this.probability = opts.probability ?? DEFAULT_EVENT_PROBABILITY;
    this.eligibility = opts.eligibility;
  }

  get source(): string {
    return `event:${this.kind}`;
  }

  shouldActivate(rng: Rng): boolean {
    return rng() < this.probability;
  }

  abstract setup(ctx: SetupContext): Effect[];

  onPlayerEliminated(_view: GameView, _elimination: Elimination): Effect[] {
    return [];
  }

  onNightStart(_view: GameView): Effect[] {
    return [];
  }

  onNightEnd(_view: GameView): Effect[] {
    return [];
  }

  protected eligiblePool(ctx: SetupContext): PlayerView[] {
    const filter = this.eligibility;
    const pool = ctx.unclaimed();
    return filter ? pool.filter(p => filter(p, ctx.view)) : pool;
  }
}

export function livingWith(view: GameView, type: Parameters<PlayerView['hasModifier']>[0]): PlayerView[] {
  return view.alivePlayers().filter(p => p.hasModifier(type));
}

export function withModifier(view: GameView, type: Parameters<PlayerView['hasModifier']>[0]): PlayerView[] {
  return view.players().filter(p => p.hasModifier(type));
}
