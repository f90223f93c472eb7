import type { Narrator } from '../agentIo.js';
import { roleBriefing, situationContext } from '../context.js';
import { EffectService, effectTypeOf } from '../effects/effectService.js';
import {
  deathEffect,
  isStateEffect,
  modifierEffect,
  removeModifierEffect,
  type Effect,
  type GameEffect,
  type StateEffect,
} from '../effects/types.js';
import { GameInvariantError, UnknownEffectError, errorMessage } from '../errors.js';
import type { DecisionContext, Elimination, EliminationCause, GameView } from '../eventModifiers/base.js';
import type { EventRegistry } from '../eventModifiers/registry.js';
import { InformationService } from '../information/informationService.js';
import { logger } from '../logger.js';
import { PostGamePhase } from '../phases/postGamePhase.js';
import { DayDiscussionPhase } from '../phases/dayDiscussionPhase.js';
import { DayVotingPhase } from '../phases/dayVotingPhase.js';
import { IntroductionPhase } from '../phases/introductionPhase.js';
import { NightPhase } from '../phases/nightPhase.js';
import { PlayerState } from '../players/playerState.js';
import { ConversationService } from '../conversation/conversationService.js';
import { VoteService } from '../voting/voteService.js';
import type { GameConfig, GameLogEntry, Phase, Role, Team, Winner } from '../types.js';
import { sleep, type Rng } from '../utils.js';

export interface Seat {
  name: string;
  role: Role;
  personality: string;
}

export interface EngineDeps {
  narrator: Narrator;
  registry: EventRegistry;
  rng: Rng;
}

export interface EliminationRequest {
  cause: EliminationCause;
  /** Full detail for the operator log. */
  privateReason: string;
  /** What the village is told; defaults to "X died." */
  publicReason?: string;
}

export interface EliminationRecord extends Elimination {
  role: Role;
  displayRole: string;
  reason: string;
}

/** Causes the village may learn. Everything else reads as a body being found. */
const PUBLIC_CAUSE: Record<EliminationCause, string> = {
  assassination: 'found dead',
  vigilante: 'found dead',
  zombie: 'found dead',
  suicide: 'found dead',
  counter_attack: 'found dead',
  bodyguard_sacrifice: 'found dead',
  heartbreak: 'heartbreak',
  lynch: 'lynched',
};

/**
 * Owns the player table and every mutation of it. Event modules and role
 * modules hand back Effects; only `applyEffects` and `eliminatePlayer` change state.
 */
export class GameEngine implements GameView {
  readonly config: GameConfig;
  readonly narrator: Narrator;
  readonly registry: EventRegistry;
  readonly rng: Rng;
  readonly info = new InformationService();
  readonly votes: VoteService;
  readonly conversation: ConversationService;

  /** Public log entries in order; the post-game transcript is built from these. */
  readonly history: GameLogEntry[] = [];
  /** Operator-facing event log with full detail. */
  readonly events: string[] = [];
  readonly eliminations: EliminationRecord[] = [];
  /** Deaths not yet announced at a day-start. */
  pendingDeathReport: string[] = [];

  gameOver = false;
  winner?: Winner;
  jesterWinner?: string;
  abortReason?: string;
  interrupted = false;

  private table: Map<string, PlayerState>;
  private readonly seatOrder: string[];
  private readonly effectService = new EffectService();
  private currentDay = 1;
  private currentPhase: Phase = 'night';
  private initialized = false;

  private introductionPhaseRunner = new IntroductionPhase();
  private nightPhaseRunner = new NightPhase();
  private dayDiscussionPhaseRunner = new DayDiscussionPhase();
  private dayVotingPhaseRunner = new DayVotingPhase();
  private postGamePhaseRunner = new PostGamePhase();

  constructor(config: GameConfig, seats: readonly Seat[], deps: EngineDeps) {
    this.config = config;
    this.narrator = deps.narrator;
    this.registry = deps.registry;
    this.rng = deps.rng;
    this.votes = new VoteService(deps.narrator);
    this.conversation = new ConversationService(deps.narrator, deps.rng);
    this.seatOrder = seats.map(s => s.name);
    this.table = new Map(seats.map(s => [s.name, new PlayerState({ ...s, day: 1 })] as const));
    if (this.table.size !== seats.length) throw new GameInvariantError('Seat names must be unique');
  }

  // --- GameView ---

  get day(): number {
    return this.currentDay;
  }

  get phase(): Phase {
    return this.currentPhase;
  }

  players(): PlayerState[] {
    return this.seatOrder.flatMap(name => {
      const p = this.table.get(name);
      return p ? [p] : [];
    });
  }

  player(name: string): PlayerState | undefined {
    return this.table.get(name);
  }

  alivePlayers(): PlayerState[] {
    return this.players().filter(p => p.alive);
  }

  // --- Queries ---

  aliveNames(): string[] {
    return this.alivePlayers().map(p => p.name);
  }

  getPlayer(name: string): PlayerState {
    const p = this.table.get(name);
    if (!p) throw new GameInvariantError(`Unknown player "${name}"`);
    return p;
  }

  livingTeam(team: Team): PlayerState[] {
    return this.alivePlayers().filter(p => p.team === team);
  }

  contextFor(name: string): string {
    const player = this.getPlayer(name);
    return situationContext({
      player,
      day: this.currentDay,
      phase: this.currentPhase,
      alive: this.aliveNames(),
      dead: this.players()
        .filter(p => !p.alive)
        .map(p => p.name),
      knowledge: this.info.buildContextFor(name, { statementWindow: this.config.memory_window_size }),
    });
  }

  briefingFor(name: string): string {
    return roleBriefing(this.getPlayer(name));
  }

  decisionContext(): DecisionContext {
    return { view: this, narrator: this.narrator, contextFor: name => this.contextFor(name) };
  }

  // --- Setup ---

  /** Registers players with the information service, briefs teams, runs event setup. Idempotent. */
  initialize(): void {
    if (this.initialized) return;
    this.initialized = true;

    logger.setKnownPlayers(this.seatOrder);
    logger.setPlayerRoles(Object.fromEntries(this.players().map(p => [p.name, p.role])));

    for (const p of this.players()) {
      this.info.registerPlayer(p.name, p.team, p.role);
      this.info.revealToPlayer(p.name, `You are ${p.roleDisplayWithArticle}.`, {
        category: 'team_info',
        day: 0,
        source: 'game',
      });
      logger.log({
        type: 'SYSTEM',
        content: `Assigned role ${p.role} to ${p.name}`,
        metadata: { role: p.role, player: p.name, visibility: 'private' },
      });
    }

    const assassins = this.players().filter(p => p.team === 'assassins');
    const names = assassins.map(p => p.name);
    for (const a of assassins) {
      const others = names.filter(n => n !== a.name);
      this.info.revealToTeam(
        'assassins',
        [a.name],
        others.length ? `Your fellow Assassins are: ${others.join(', ')}.` : 'You are the only Assassin.',
        { category: 'team_info', day: 0, source: 'game' }
      );
    }

    this.registry.setupAll(this, effects => this.applyEffects(effects));
    if (this.registry.kinds.length) {
      logger.log({
        type: 'SYSTEM',
        content: `Active events: ${this.registry.active.map(e => e.name).join(', ')}`,
        metadata: { visibility: 'private' },
      });
    }
  }

  // --- Logging ---

  recordPublic(entry: Omit<GameLogEntry, 'id' | 'timestamp'>): GameLogEntry {
    const fullEntry = logger.log({ ...entry, metadata: { ...(entry.metadata ?? {}), visibility: 'public' } });
    this.history.push(fullEntry);
    return fullEntry;
  }

  /** A public system line that players also learn. */
  announce(content: string): void {
    this.recordPublic({ type: 'SYSTEM', content });
    this.info.revealToAll(content, { category: 'game_state', day: this.currentDay, source: 'game' });
  }

  logThought(player: string, thought: string): void {
    if (!this.config.log_thoughts || !thought) return;
    logger.log({ type: 'THOUGHT', player, content: thought, metadata: { visibility: 'private' } });
  }

  private logEvent(content: string): void {
    this.events.push(content);
    logger.log({ type: 'SYSTEM', content, metadata: { visibility: 'private', kind: 'event_log' } });
  }

  // --- Mutation ---

  /**
   * Kills a living player, notifies every event and publishes the death record.
   * Returns false, doing nothing, when the player is already dead.
   */
  eliminatePlayer(name: string, req: EliminationRequest): boolean {
    const before = this.getPlayer(name);
    if (!before.alive) {
      this.logEvent(`Ignored elimination of ${name} (${req.cause}): already dead.`);
      return false;
    }

    this.applyState([deathEffect(name, req.cause, 'game', this.currentDay)]);
    const dead = this.getPlayer(name);
    const record: EliminationRecord = {
      player: name,
      cause: req.cause,
      day: this.currentDay,
      phase: this.currentPhase,
      role: dead.role,
      displayRole: dead.displayRole,
      reason: req.privateReason,
    };
    this.eliminations.push(record);
    this.pendingDeathReport.push(name);
    this.logEvent(`${name} (${dead.displayRole}) has been eliminated. ${req.privateReason}`);

    this.applyEffects(this.registry.notifyElimination(this, record));

    const roleDisplay = this.config.reveal_roles_on_death ? this.getPlayer(name).roleDisplayWithArticle : undefined;
    const announcement = req.publicReason ?? `${name} died.`;
    const info = this.info.revealDeath(name, PUBLIC_CAUSE[req.cause], this.currentDay, roleDisplay, announcement);
    // An explicit role key stops the logger from tagging the entry with the hidden role.
    this.recordPublic({
      type: 'DEATH',
      content: info.content,
      metadata: {
        player: name,
        cause: PUBLIC_CAUSE[req.cause],
        role: this.config.reveal_roles_on_death ? dead.role : undefined,
      },
    });
    return true;
  }

  applyEffects(effects: readonly Effect[]): void {
    for (const effect of effects) {
      if (isStateEffect(effect)) this.applyState([effect]);
      else this.applyGameEffect(effect);
    }
  }

  private applyState(effects: readonly StateEffect[]): void {
    this.table = this.effectService.applyAll(this.table, effects);
    for (const e of effects) {
      if (e.type === 'change_role' || e.type === 'change_team') {
        const p = this.getPlayer(e.target);
        this.info.updatePlayer(p.name, { role: p.role, team: p.team });
        logger.setPlayerRole(p.name, p.role);
      }
    }
  }

  private applyGameEffect(effect: GameEffect): void {
    switch (effect.type) {
      case 'jester_victory':
        this.winner = 'jester';
        this.jesterWinner = effect.winner;
        this.gameOver = true;
        this.logEvent(`${effect.winner} was the Jester and wins by being lynched.`);
        break;
      case 'heartbreak_death':
        this.eliminatePlayer(effect.target, {
          cause: 'heartbreak',
          privateReason: `${effect.target} died of a broken heart after losing ${effect.partner}.`,
          publicReason: `${effect.target} died of a broken heart.`,
        });
        break;
      case 'suicide_death':
        this.eliminatePlayer(effect.target, {
          cause: 'suicide',
          privateReason: 'They took their own life.',
          publicReason: `${effect.target} was found dead.`,
        });
        break;
      case 'bodyguard_sacrifice':
        this.eliminatePlayer(effect.target, {
          cause: 'bodyguard_sacrifice',
          privateReason: `They died protecting ${effect.protectedPlayer}.`,
          publicReason: `${effect.target} was found dead.`,
        });
        break;
      case 'become_ghost':
        this.applyState([
          modifierEffect(effect.target, 'ghost', effect.source, { data: { haunting: null } }),
          modifierEffect(effect.target, 'ghost_pending', effect.source),
        ]);
        this.logEvent(`${effect.target}'s spirit lingers as a ghost.`);
        break;
      case 'counter_kill':
        this.eliminatePlayer(effect.target, {
          cause: 'counter_attack',
          privateReason: `They were shot by ${effect.gunNut} during their attack.`,
          publicReason: `${effect.target} was found dead.`,
        });
        break;
      case 'night_kill':
        this.eliminatePlayer(effect.target, {
          cause: effect.killer === 'assassins' ? 'assassination' : 'vigilante',
          privateReason: effect.killer === 'assassins' ? 'They were killed by the Assassins.' : 'They were shot by the Vigilante.',
          publicReason: `${effect.target} was found dead.`,
        });
        break;
      case 'zombie_kill':
        this.applyState([modifierEffect(effect.target, 'infected', effect.source)]);
        this.eliminatePlayer(effect.target, {
          cause: 'zombie',
          privateReason: `They were killed by zombie ${effect.zombie}.`,
          publicReason: `${effect.target} was found dead.`,
        });
        break;
      case 'resurrect':
        this.resurrect(effect.target, effect.by);
        break;
      case 'reveal':
        if (effect.scope === 'public') {
          this.info.revealToAll(effect.content, { category: effect.category, day: this.currentDay, source: effect.source });
          this.recordPublic({ type: 'SYSTEM', content: effect.content, metadata: { source: effect.source } });
        } else {
          this.info.revealToPlayer(effect.target, effect.content, {
            category: effect.category,
            day: this.currentDay,
            source: effect.source,
          });
          logger.log({
            type: 'SYSTEM',
            player: effect.target,
            content: effect.content,
            metadata: { source: effect.source, visibility: 'private' },
          });
        }
        break;
      case 'narrate':
        this.logEvent(effect.content);
        break;
      default: {
        const unhandled: never = effect;
        throw new UnknownEffectError(effectTypeOf(unhandled));
      }
    }
  }

  /** Back to life with every death-bound status cleared. */
  resurrect(name: string, by: string): void {
    const p = this.getPlayer(name);
    if (p.alive) throw new GameInvariantError(`Cannot resurrect ${name}: they are alive`);

    this.applyState([
      { type: 'revive_player', target: name, source: 'event:priest' },
      removeModifierEffect(name, 'pending_rise', 'event:priest'),
      removeModifierEffect(name, 'zombie', 'event:priest'),
      removeModifierEffect(name, 'ghost', 'event:priest'),
      removeModifierEffect(name, 'ghost_pending', 'event:priest'),
    ]);
    this.pendingDeathReport = this.pendingDeathReport.filter(n => n !== name);
    this.logEvent(`${by} resurrected ${name}.`);
    this.announce(`${name} has miraculously returned from the dead!`);
  }

  // --- Flow ---

  /** Jester first; then no Assassins left; then Assassins at parity. */
  checkWinCondition(): Winner | undefined {
    if (this.winner) {
      this.gameOver = true;
      return this.winner;
    }
    const assassins = this.livingTeam('assassins').length;
    const village = this.livingTeam('village').length;
    if (assassins === 0) this.winner = 'village';
    else if (assassins >= village) this.winner = 'assassins';
    if (this.winner) this.gameOver = true;
    return this.winner;
  }

  /** Night N → Day N → Night N+1. Modifiers expire as the day number moves. */
  advancePhase(): void {
    if (this.currentPhase === 'night') {
      this.currentPhase = 'day';
    } else {
      this.currentPhase = 'night';
      this.currentDay++;
    }
    for (const p of this.table.values()) {
      for (const expired of p.updateModifiers(this.currentDay)) {
        logger.log({
          type: 'SYSTEM',
          player: p.name,
          content: `${expired.type} expired`,
          metadata: { visibility: 'private', kind: 'modifier_expired' },
        });
      }
    }
  }

  /** Clears last night's protection before anyone acts. */
  resetNightState(): void {
    const effects: StateEffect[] = [];
    for (const p of this.players()) {
      if (p.hasModifier('protected')) effects.push(removeModifierEffect(p.name, 'protected', 'game'));
      if (p.hasModifier('guarded')) effects.push(removeModifierEffect(p.name, 'guarded', 'game'));
    }
    if (effects.length) this.applyState(effects);
  }

  async start(signal?: AbortSignal): Promise<void> {
    this.initialize();
    this.announce(`Welcome to the village. ${this.seatOrder.length} players: ${this.seatOrder.join(', ')}.`);
    this.recordPublic({ type: 'SYSTEM', content: 'Game Starting...' });

    if (this.config.introductions) {
      await this.runStep('introductions', () => this.introductionPhaseRunner.run(this));
    }

    while (!this.gameOver && !this.abortReason) {
      if (signal?.aborted) {
        this.interrupted = true;
        this.abortReason = 'interrupted by operator';
        break;
      }
      if (this.currentDay > this.config.max_days) {
        this.abortReason = `no winner after ${this.config.max_days} days`;
        break;
      }
      await this.playRound(signal);
    }

    if (this.gameOver) {
      this.recordPublic({ type: 'WIN', content: this.winAnnouncement() });
      if (!signal?.aborted) await this.runStep('post-game', () => this.postGamePhaseRunner.run(this));
      return;
    }
    this.recordPublic({ type: 'SYSTEM', content: `Game aborted: ${this.abortReason ?? 'unknown reason'}` });
  }

  winAnnouncement(): string {
    switch (this.winner) {
      case 'jester':
        return `Game Over! ${this.jesterWinner ?? 'The Jester'} was the Jester and wins by being lynched!`;
      case 'assassins':
        return 'Game Over! The Assassins win: they now equal or outnumber the village.';
      case 'village':
        return 'Game Over! The village wins: every Assassin has been eliminated.';
      default:
        return 'Game Over!';
    }
  }

  private async playRound(signal?: AbortSignal): Promise<void> {
    if (!(await this.runStep('night phase', () => this.nightPhaseRunner.run(this)))) return;
    if (this.checkWinCondition()) return;
    await this.pause(signal);
    if (signal?.aborted) return;

    this.advancePhase();
    if (!(await this.runStep('day discussion phase', () => this.dayDiscussionPhaseRunner.run(this)))) return;
    if (this.checkWinCondition()) return;
    if (!(await this.runStep('day voting phase', () => this.dayVotingPhaseRunner.run(this)))) return;
    if (this.checkWinCondition()) return;
    await this.pause(signal);

    this.advancePhase();
  }

  private pause(signal?: AbortSignal): Promise<void> {
    return sleep(this.config.delay_seconds * 1000, signal);
  }

  private async runStep(label: string, step: () => Promise<void>): Promise<boolean> {
    try {
      await step();
      return true;
    } catch (error) {
      this.abort(`${label} failed`, error);
      return false;
    }
  }

  private abort(message: string, error: unknown) {
    const details = errorMessage(error);
    this.abortReason = `${message}: ${details}`;
    logger.log({
      type: 'SYSTEM',
      content: `Engine abort: ${message}: ${details}`,
      metadata: { visibility: 'private', error },
    });
  }
}
