import { z } from 'zod';

// --- Configuration Types ---

export const RoleSchema = z.enum([
  'assassin',
  'doctor',
  'detective',
  'vigilante',
  'mad_scientist',
  'zombie',
  'villager',
]);
export type Role = z.infer<typeof RoleSchema>;

export const TeamSchema = z.enum(['assassins', 'village']);
export type Team = z.infer<typeof TeamSchema>;

export const EventKindSchema = z.enum([
  'zombie',
  'ghost',
  'sleepwalker',
  'insomniac',
  'gun_nut',
  'suicidal',
  'drunk',
  'jester',
  'priest',
  'lovers',
  'bodyguard',
]);
export type EventKind = z.infer<typeof EventKindSchema>;

export const PlayerConfigSchema = z.object({
  name: z.string().min(1),
  personality: z.string().default('thoughtful and observant'),
  // AI Gateway model id in `provider/model` format, e.g. `openai/gpt-4o`.
  model: z.string().default('openai/gpt-4o-mini'),
  temperature: z.number().min(0).max(2).default(0.8),
});
export type PlayerConfig = z.infer<typeof PlayerConfigSchema>;

export const EventTogglesSchema = z
  .object({
    zombie: z.boolean().default(false),
    ghost: z.boolean().default(false),
    sleepwalker: z.boolean().default(false),
    insomniac: z.boolean().default(false),
    gun_nut: z.boolean().default(false),
    suicidal: z.boolean().default(false),
    drunk: z.boolean().default(false),
    jester: z.boolean().default(false),
    priest: z.boolean().default(false),
    lovers: z.boolean().default(false),
    bodyguard: z.boolean().default(false),
  })
  .default({});
export type EventToggles = z.infer<typeof EventTogglesSchema>;

export const MIN_PLAYERS = 5;
export const MAX_PLAYERS = 20;

export const GameConfigSchema = z
  .object({
    system_prompt: z
      .string()
      .default('You are playing Assassins, a social deduction game in a small village.'),
    players: z.array(PlayerConfigSchema).min(MIN_PLAYERS),
    // Seat only the first N roster entries.
    player_count: z.number().int().min(MIN_PLAYERS).max(MAX_PLAYERS).optional(),
    roles: z.record(z.string(), RoleSchema).optional(), // forced name -> role assignment
    seed: z.number().int().optional(),
    discussion_rounds: z.number().int().min(1).max(5).default(2),
    // Safety stop for games that stall (e.g. endless tied votes).
    max_days: z.number().int().min(1).default(30),
    memory_window_size: z.number().int().positive().default(20),
    reveal_roles_on_death: z.boolean().default(true),
    events: EventTogglesSchema,
    chaos: z.boolean().default(false),
    random_events: z.boolean().default(false),
    event_probability: z.number().min(0).max(1).default(0.1),
    delay_seconds: z.number().min(0).default(0),
    introductions: z.boolean().default(true),
    blackboard: z.boolean().default(false),
    post_game_reflections: z.boolean().default(true),
    log_thoughts: z.boolean().default(false),
    agent_timeout_ms: z.number().int().positive().default(60_000),
    agent_max_attempts: z.number().int().min(1).max(5).default(2),
  })
  .superRefine((cfg, ctx) => {
    const seen = new Set<string>();
    for (const p of cfg.players) {
      if (seen.has(p.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate player name "${p.name}"` });
      }
      seen.add(p.name);
    }
    if (cfg.player_count !== undefined && cfg.player_count > cfg.players.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `player_count ${cfg.player_count} exceeds roster size ${cfg.players.length}`,
      });
    }
  });
export type GameConfig = z.infer<typeof GameConfigSchema>;
export type GameConfigInput = z.input<typeof GameConfigSchema>;

// --- Game State Types ---

export type Phase = 'night' | 'day';

// A lone Jester wins by being lynched; that outcome is reported apart from the teams.
export type Winner = Team | 'jester';

// --- Logging Types ---

export type LogType = 'SYSTEM' | 'CHAT' | 'ACTION' | 'VOTE' | 'DEATH' | 'WIN' | 'THOUGHT' | 'TEAM_CHAT';

export type LogVisibility = 'public' | 'private' | 'team';

export interface GameLogMetadata {
  // Common structured fields
  role?: Role;
  team?: Team;
  visibility?: LogVisibility;

  // Frequently used game fields
  player?: string; // player referred-to (not necessarily the actor)
  target?: string;
  vote?: string;
  result?: string;
  kind?: string;

  // Allow additional structured fields without `any`
  [key: string]: unknown;
}

export interface GameLogEntry {
  id: string;
  timestamp: string;
  type: LogType;
  player?: string;
  content: string;
  metadata?: GameLogMetadata;
}
