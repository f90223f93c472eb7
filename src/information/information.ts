import { randomUUID } from 'crypto';

export type InfoCategory =
  | 'death'
  | 'role_reveal'
  | 'vote'
  | 'statement'
  | 'action'
  | 'night_result'
  | 'team_info'
  | 'game_state';

export type VisibilityScope = 'public' | 'private' | 'team' | 'role';

/**
 * Who may see a piece of information. `isVisibleTo` is the single check every reader goes through.
 */
export class Visibility {
  private constructor(
    readonly scope: VisibilityScope,
    private readonly targets: ReadonlySet<string>
  ) {}

  static public(): Visibility {
    return new Visibility('public', new Set());
  }

  static private(names: Iterable<string>): Visibility {
    return new Visibility('private', new Set(names));
  }

  static team(team: string): Visibility {
    return new Visibility('team', new Set([team]));
  }

  static role(role: string): Visibility {
    return new Visibility('role', new Set([role]));
  }

  get targetList(): string[] {
    return [...this.targets];
  }

  isVisibleTo(player: string, team?: string, role?: string): boolean {
    switch (this.scope) {
      case 'public':
        return true;
      case 'private':
        return this.targets.has(player);
      case 'team':
        return team !== undefined && this.targets.has(team);
      case 'role':
        return role !== undefined && this.targets.has(role);
    }
  }

  describe(): string {
    return this.scope === 'public' ? 'public' : `${this.scope}:${this.targetList.join(',')}`;
  }
}

let sequence = 0;

export interface InformationInit {
  content: string;
  source: string;
  category: InfoCategory;
  visibility: Visibility;
  day: number;
  metadata?: Readonly<Record<string, unknown>>;
  timestamp?: number;
}

/** An immutable fact. Only the set of players it has been revealed to grows. */
export class Information {
  readonly id: string;
  readonly content: string;
  readonly source: string;
  readonly category: InfoCategory;
  readonly visibility: Visibility;
  readonly day: number;
  readonly timestamp: number;
  /** Creation order; breaks ties between records stamped in the same millisecond. */
  readonly sequence: number;
  readonly metadata: Readonly<Record<string, unknown>>;
  private readonly revealedTo = new Set<string>();

  constructor(init: InformationInit) {
    this.id = randomUUID();
    this.content = init.content;
    this.source = init.source;
    this.category = init.category;
    this.visibility = init.visibility;
    this.day = init.day;
    this.timestamp = init.timestamp ?? Date.now();
    this.sequence = ++sequence;
    this.metadata = Object.freeze({ ...(init.metadata ?? {}) });
  }

  isVisibleTo(player: string, team?: string, role?: string): boolean {
    return this.visibility.isVisibleTo(player, team, role);
  }

  markRevealed(player: string): void {
    this.revealedTo.add(player);
  }

  wasRevealedTo(player: string): boolean {
    return this.revealedTo.has(player);
  }

  get revealedToNames(): string[] {
    return [...this.revealedTo];
  }
}

export function createInformation(
  content: string,
  source: string,
  category: InfoCategory,
  visibility: Visibility,
  day: number,
  metadata?: Record<string, unknown>
): Information {
  return new Information({ content, source, category, visibility, day, metadata });
}

export function compareChronologically(a: Information, b: Information): number {
  return a.timestamp - b.timestamp || a.sequence - b.sequence;
}
