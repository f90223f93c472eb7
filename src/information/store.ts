import { compareChronologically, type InfoCategory, type Information } from './information.js';

export interface InformationQuery {
  category?: InfoCategory;
  day?: number;
  /** Inclusive lower bound, epoch ms. */
  after?: number;
  /** Inclusive upper bound, epoch ms. */
  before?: number;
  source?: string;
  visibleTo?: { player: string; team?: string; role?: string };
}

export class InformationStore {
  private readonly records = new Map<string, Information>();
  private readonly categoryIndex = new Map<InfoCategory, Set<string>>();
  private readonly dayIndex = new Map<number, Set<string>>();

  add(info: Information): string {
    this.records.set(info.id, info);
    indexInto(this.categoryIndex, info.category, info.id);
    indexInto(this.dayIndex, info.day, info.id);
    return info.id;
  }

  get(id: string): Information | undefined {
    return this.records.get(id);
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  /** All filters are ANDed. Results are oldest first. */
  query(filters: InformationQuery = {}): Information[] {
    let candidates: Iterable<Information> = this.records.values();
    if (filters.category !== undefined) {
      candidates = this.resolve(this.categoryIndex.get(filters.category));
    } else if (filters.day !== undefined) {
      candidates = this.resolve(this.dayIndex.get(filters.day));
    }

    const out: Information[] = [];
    for (const info of candidates) {
      if (filters.category !== undefined && info.category !== filters.category) continue;
      if (filters.day !== undefined && info.day !== filters.day) continue;
      if (filters.after !== undefined && info.timestamp < filters.after) continue;
      if (filters.before !== undefined && info.timestamp > filters.before) continue;
      if (filters.source !== undefined && info.source !== filters.source) continue;
      if (filters.visibleTo) {
        const { player, team, role } = filters.visibleTo;
        if (!info.isVisibleTo(player, team, role)) continue;
      }
      out.push(info);
    }
    return out.sort(compareChronologically);
  }

  byCategory(category: InfoCategory): Information[] {
    return this.query({ category });
  }

  byDay(day: number): Information[] {
    return this.query({ day });
  }

  get count(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
    this.categoryIndex.clear();
    this.dayIndex.clear();
  }

  private resolve(ids: ReadonlySet<string> | undefined): Information[] {
    if (!ids) return [];
    const out: Information[] = [];
    for (const id of ids) {
      const info = this.records.get(id);
      if (info) out.push(info);
    }
    return out;
  }
}

function indexInto<K>(index: Map<K, Set<string>>, key: K, id: string): void {
  let bucket = index.get(key);
  if (!bucket) {
    bucket = new Set();
    index.set(key, bucket);
  }
  bucket.add(id);
}

/** The record ids a single player has been granted. */
export class KnowledgeState {
  private readonly ids = new Set<string>();

  constructor(readonly player: string) {}

  add(id: string): void {
    this.ids.add(id);
  }

  addMany(ids: Iterable<string>): void {
    for (const id of ids) this.ids.add(id);
  }

  knows(id: string): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }

  get knownIds(): string[] {
    return [...this.ids];
  }
}
