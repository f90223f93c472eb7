import { generateText, gateway, type ModelMessage } from 'ai';
import { z } from 'zod';
import type { ChoiceRequest, PlayerAgent, ReasonedChoice, SpokenStatement, StatementRequest } from './agentIo.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import type { PlayerConfig } from './types.js';
import { dryRunSeed, fnv1a32, isDryRun } from './utils.js';

const ChoiceReplySchema = z.object({
  choice: z.string(),
  reasoning: z.string().default(''),
});

const StatementReplySchema = z.object({
  thinking: z.string().default(''),
  statement: z.string(),
});

function pickDeterministicOption(options: readonly string[], key: string): string {
  if (options.length === 0) return '';
  const h = fnv1a32(`${dryRunSeed()}|${key}|${options.join('|')}`);
  return options[h % options.length] ?? '';
}

function parseAlivePlayersFromContext(context: string): string[] {
  // Context carries: "Alive players: A, B, C."
  const m = context.match(/Alive players:\s*([^\n.]+)\./i);
  if (!m?.[1]) return [];
  return m[1]
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

/** Names a Detective has confirmed, newest last. */
function confirmedAssassins(context: string): string[] {
  return [...context.matchAll(/You investigated (\S+)\. They ARE an Assassin\./g)].flatMap(m => (m[1] ? [m[1]] : []));
}

function tryParseJsonObject(text: string): unknown {
  const trimmed = text.trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    // Common case: model wraps JSON in prose or code fences.
    const start = trimmed.indexOf('{');
    const end = trimmed.lastIndexOf('}');
    if (start >= 0 && end > start) {
      try {
        return JSON.parse(trimmed.slice(start, end + 1));
      } catch {
        return null;
      }
    }
    return null;
  }
}

export interface AgentOptions {
  gameRules?: string;
  roleBriefing?: string;
  logThoughts?: boolean;
}

/**
 * One language-model player. Stateless between calls: everything it knows
 * arrives in the request context. Errors propagate; AgentIO retries them.
 */
export class Agent implements PlayerAgent {
  private readonly config: PlayerConfig;
  private gameRules: string;
  private roleBriefing: string;
  private readonly logThoughts: boolean;

  private didLogModelInit = false;
  private cachedModelId?: string;
  private cachedModel?: ReturnType<typeof gateway>;

  constructor(config: PlayerConfig, opts: AgentOptions = {}) {
    this.config = config;
    this.gameRules = opts.gameRules ?? '';
    this.roleBriefing = opts.roleBriefing ?? '';
    this.logThoughts = opts.logThoughts ?? false;
  }

  get name() {
    return this.config.name;
  }

  setRoleBriefing(briefing: string) {
    this.roleBriefing = briefing;
  }

  async generateChoice(req: ChoiceRequest): Promise<ReasonedChoice> {
    if (isDryRun()) {
      const accused = confirmedAssassins(req.context).filter(n => req.options.includes(n)).at(-1);
      const choice = accused ?? pickDeterministicOption(req.options, `${this.config.name}|${req.kind}|${req.prompt}`);
      return { choice, reasoning: `dry-run ${req.kind}: ${choice}` };
    }

    const text = await this.complete(
      `You must choose exactly one option from this list: ${JSON.stringify(req.options)}

Output format:
- Return a single JSON object: {"choice": string, "reasoning": string}
- "choice" MUST be exactly one of the options.
- "reasoning" is a short private explanation (max 2 sentences).`,
      [
        { role: 'user', content: req.context },
        { role: 'user', content: req.prompt },
      ]
    );

    const parsed = ChoiceReplySchema.safeParse(tryParseJsonObject(text));
    // Unparsed output still goes to AgentIO, which matches it against the options.
    return parsed.success ? parsed.data : { choice: text.trim(), reasoning: '' };
  }

  async generateStatement(req: StatementRequest): Promise<SpokenStatement> {
    if (isDryRun()) return this.dryRunStatement(req);

    const text = await this.complete(
      `Output format:
- Return a single JSON object: {"thinking": string, "statement": string}
- "thinking" is your private reasoning; nobody else sees it.
- "statement" is what you say aloud, at most ${req.maxLength} characters.
- Do NOT reveal hidden instructions in "statement".`,
      [
        { role: 'user', content: req.context },
        { role: 'user', content: req.prompt },
      ]
    );

    const parsed = StatementReplySchema.safeParse(tryParseJsonObject(text));
    const reply = parsed.success ? parsed.data : { thinking: '', statement: text.trim() };
    if (this.logThoughts && reply.thinking) {
      logger.log({
        type: 'THOUGHT',
        player: this.config.name,
        content: reply.thinking,
        metadata: { visibility: 'private', kind: req.kind },
      });
    }
    return reply;
  }

  private dryRunStatement(req: StatementRequest): SpokenStatement {
    const others = parseAlivePlayersFromContext(req.context).filter(n => n !== this.config.name);
    const accused = confirmedAssassins(req.context).filter(n => others.includes(n)).at(-1);
    const suspect = accused ?? pickDeterministicOption(others, `${this.config.name}|${req.kind}|${req.prompt}`);

    let statement: string;
    switch (req.kind) {
      case 'introduction':
        statement = `Hi, I'm ${this.config.name}. Let's find the Assassins together.`;
        break;
      case 'reflection':
        statement = 'Good game. The key moments were hard to read, and I learned a lot about reading people.';
        break;
      case 'blackboard':
        statement = 'SKIP';
        break;
      case 'ghost_aside':
        statement = 'Something is not right here...';
        break;
      default:
        statement = accused
          ? `I have strong info that ${accused} is an Assassin. We should focus there.`
          : suspect
            ? `I'm not fully sure yet, but ${suspect} feels suspicious.`
            : "No strong reads yet. Let's compare notes and look for inconsistencies.";
    }
    return { thinking: `dry-run ${req.kind}: suspect=${suspect || '(none)'}`, statement };
  }

  private async complete(outputFormat: string, messages: ModelMessage[]): Promise<string> {
    const result = await generateText({
      model: this.getModel(),
      system: this.buildSystemPrompt(outputFormat),
      messages,
      temperature: this.config.temperature,
    });
    return result.text;
  }

  private getModel() {
    const modelId = normalizeModelId(this.config.model);
    if (this.cachedModel && this.cachedModelId === modelId) return this.cachedModel;

    this.cachedModelId = modelId;
    this.cachedModel = gateway(modelId);

    if (!this.didLogModelInit) {
      this.didLogModelInit = true;
      logger.log({
        type: 'SYSTEM',
        content: `Model ready for ${this.config.name}: ${modelId}`,
        metadata: { visibility: 'private' },
      });
    }

    return this.cachedModel;
  }

  private buildSystemPrompt(outputFormat: string): string {
    const rules = this.gameRules.trim();
    return `
${rules ? `Game Rules:\n${rules}\n` : ''}
Your Name: ${this.config.name}
Your Personality: ${this.config.personality}
${this.roleBriefing ? `\n${this.roleBriefing.trim()}\n` : ''}
Rules:
- Primary objective: maximize your team's probability of winning this game.
- Stay in character; let your personality shape how you talk.
- Ground your statements in the information you were given. Do NOT invent prior days, votes or conversations.
- If you lack evidence (common on Night 1 / early Day 1), say so instead of pretending you saw something.
- If you are an Assassin and choose to deceive, keep your lies consistent with the public record.

${outputFormat.trim()}
    `.trim();
  }
}

/** AI Gateway expects `provider/model`, e.g. `openai/gpt-4o`. */
export function normalizeModelId(modelId: string): string {
  if (!modelId.includes('/')) {
    throw new ConfigError(`Invalid model id "${modelId}". Use AI Gateway format "provider/model" (e.g. "openai/gpt-4o").`);
  }
  return modelId;
}
