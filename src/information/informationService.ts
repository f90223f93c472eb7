import type { Role, Team } from '../types.js';
import { Information, Visibility, type InfoCategory } from './information.js';
import { InformationStore, KnowledgeState } from './store.js';

export interface RevealOptions {
  category: InfoCategory;
  day: number;
  source?: string;
  metadata?: Record<string, unknown>;
}

export interface ContextOptions {
  category?: InfoCategory;
  day?: number;
  /** Only records stamped at or after this epoch ms. */
  since?: number;
  /** Keep only the most recent N statements; other records are never dropped. */
  statementWindow?: number;
}

interface RegisteredPlayer {
  team: Team;
  role: Role;
  knowledge: KnowledgeState;
}

const CATEGORY_ORDER: readonly InfoCategory[] = [
  'game_state',
  'team_info',
  'role_reveal',
  'death',
  'night_result',
  'action',
  'vote',
  'statement',
];

/**
 * Who knows what. Every reveal creates one immutable record and grants it explicitly
 * to the players who should currently have it.
 */
export class InformationService {
  readonly store = new InformationStore();
  private readonly players = new Map<string, RegisteredPlayer>();

  registerPlayer(name: string, team: Team, role: Role): void {
    const existing = this.players.get(name);
    this.players.set(name, { team, role, knowledge: existing?.knowledge ?? new KnowledgeState(name) });
  }

  /** Keep team/role in sync after a role or team change. */
  updatePlayer(name: string, update: { team?: Team; role?: Role }): void {
    const p = this.players.get(name);
    if (!p) return;
    this.players.set(name, { ...p, team: update.team ?? p.team, role: update.role ?? p.role });
  }

  get registeredPlayers(): string[] {
    return [...this.players.keys()];
  }

  knowledgeOf(name: string): KnowledgeState | undefined {
    return this.players.get(name)?.knowledge;
  }

  revealToPlayer(player: string, content: string, opts: RevealOptions): Information {
    return this.revealToPlayers([player], content, opts);
  }

  revealToPlayers(names: readonly string[], content: string, opts: RevealOptions): Information {
    const info = this.record(content, Visibility.private(names), opts);
    for (const name of names) this.grant(name, info);
    return info;
  }

  /** Team membership can change, so the caller passes the current roster. */
  revealToTeam(team: Team, members: readonly string[], content: string, opts: RevealOptions): Information {
    const info = this.record(content, Visibility.team(team), opts);
    for (const name of members) {
      const p = this.players.get(name);
      if (p && info.isVisibleTo(name, p.team, p.role)) this.grant(name, info);
    }
    return info;
  }

  revealToRole(role: Role, members: readonly string[], content: string, opts: RevealOptions): Information {
    const info = this.record(content, Visibility.role(role), opts);
    for (const name of members) {
      const p = this.players.get(name);
      if (p && info.isVisibleTo(name, p.team, p.role)) this.grant(name, info);
    }
    return info;
  }

  revealToAll(content: string, opts: RevealOptions): Information {
    const info = this.record(content, Visibility.public(), opts);
    for (const name of this.players.keys()) this.grant(name, info);
    return info;
  }

  /**
   * Public death record. `roleDisplay` is omitted when roles stay hidden on death;
   * `announcement` replaces the plain "X died." opening.
   */
  revealDeath(name: string, cause: string, day: number, roleDisplay?: string, announcement?: string): Information {
    const opening = announcement ?? `${name} died.`;
    const content = roleDisplay ? `${opening} They were ${roleDisplay}.` : opening;
    return this.revealToAll(content, {
      category: 'death',
      day,
      source: 'game',
      metadata: { player: name, cause, role: roleDisplay ?? null },
    });
  }

  revealRole(name: string, roleDisplay: string, day: number, source = 'game'): Information {
    return this.revealToAll(`${name} is ${roleDisplay}.`, {
      category: 'role_reveal',
      day,
      source,
      metadata: { player: name, role: roleDisplay },
    });
  }

  /** Records the player has been granted and may still see, oldest first. */
  visibleTo(name: string, opts: ContextOptions = {}): Information[] {
    const p = this.players.get(name);
    if (!p) return [];
    return this.store
      .query({
        category: opts.category,
        day: opts.day,
        after: opts.since,
        visibleTo: { player: name, team: p.team, role: p.role },
      })
      .filter(info => p.knowledge.knows(info.id));
  }

  buildContextFor(name: string, opts: ContextOptions = {}): string {
    let visible = this.visibleTo(name, opts);
    const limit = opts.statementWindow;
    if (limit !== undefined) {
      const statements = visible.filter(info => info.category === 'statement');
      const dropped = new Set(statements.slice(0, Math.max(0, statements.length - limit)));
      visible = visible.filter(info => !dropped.has(info));
    }
    return visible.map(info => info.content).join('\n');
  }

  knowledgeSummary(name: string): string {
    const visible = this.visibleTo(name);
    if (visible.length === 0) return 'No information available.';

    const sections: string[] = [];
    for (const category of CATEGORY_ORDER) {
      const items = visible.filter(info => info.category === category);
      if (items.length === 0) continue;
      sections.push(
        `${category.toUpperCase().replace('_', ' ')}:\n${items.map(info => `  - ${info.content}`).join('\n')}`
      );
    }
    return sections.join('\n\n');
  }

  private record(content: string, visibility: Visibility, opts: RevealOptions): Information {
    const info = new Information({
      content,
      source: opts.source ?? 'game',
      category: opts.category,
      visibility,
      day: opts.day,
      metadata: opts.metadata,
    });
    this.store.add(info);
    return info;
  }

  private grant(name: string, info: Information): void {
    const p = this.players.get(name);
    if (!p) return;
    p.knowledge.add(info.id);
    info.markRevealed(name);
  }
}
