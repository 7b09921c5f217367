/**
 * ledger-agent Configuration
 *
 * Defaults, then environment, then the JSON config file, then CLI options.
 */

import { homedir } from 'os';
import { join } from 'path';
import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';

export interface AgentConfig {
  ledgerUrl: string;
  difficulty: number;
  recheckInterval: number;
  timeoutMs: number;
  taintedDelayMs: number;
  rejectBackoffMs: number;
  retryDelayMs: number;
  verbose: boolean;
}

const DEFAULT_CONFIG: AgentConfig = {
  ledgerUrl: 'http://localhost',
  difficulty: 16,
  recheckInterval: 512,
  timeoutMs: 5000,
  taintedDelayMs: 100,
  rejectBackoffMs: 50,
  retryDelayMs: 100,
  verbose: false,
};

export const AgentConfigSchema = z.object({
  ledgerUrl: z.string().url(),
  difficulty: z.number().int().min(0).max(256)
    .refine(bits => bits % 4 === 0, 'difficulty must be a multiple of 4 bits'),
  recheckInterval: z.number().int().min(1),
  timeoutMs: z.number().int().min(1),
  taintedDelayMs: z.number().int().min(0),
  rejectBackoffMs: z.number().int().min(0),
  retryDelayMs: z.number().int().min(0),
  verbose: z.boolean(),
});

const ConfigFileSchema = AgentConfigSchema.omit({ verbose: true }).partial();

export type ConfigWarning = (message: string) => void;

export class Config implements AgentConfig {
  ledgerUrl: string;
  difficulty: number;
  recheckInterval: number;
  timeoutMs: number;
  taintedDelayMs: number;
  rejectBackoffMs: number;
  retryDelayMs: number;
  verbose: boolean;
  configPath: string;

  constructor(
    options: Record<string, string | boolean> = {},
    env: NodeJS.ProcessEnv = process.env,
    warn: ConfigWarning = message => console.warn(`[agent] ⚠️  ${message}`)
  ) {
    // Start with defaults
    const values: Record<keyof AgentConfig, unknown> = { ...DEFAULT_CONFIG };

    // Set config path
    this.configPath = env.LEDGER_AGENT_CONFIG || join(homedir(), '.ledger-agent', 'config.json');
    if (typeof options.config === 'string') this.configPath = options.config;

    // Load from environment
    if (env.LEDGER_URL) values.ledgerUrl = env.LEDGER_URL;
    if (env.LEDGER_DIFFICULTY) values.difficulty = Number(env.LEDGER_DIFFICULTY);
    if (env.LEDGER_RECHECK_INTERVAL) values.recheckInterval = Number(env.LEDGER_RECHECK_INTERVAL);
    if (env.LEDGER_TIMEOUT_MS) values.timeoutMs = Number(env.LEDGER_TIMEOUT_MS);

    // Load from config file
    Object.assign(values, this.loadConfigFile(warn));

    // Override with CLI options
    if (typeof options.url === 'string') values.ledgerUrl = options.url;
    if (typeof options.difficulty === 'string') values.difficulty = Number(options.difficulty);
    if (typeof options.interval === 'string') values.recheckInterval = Number(options.interval);
    if (typeof options.timeout === 'string') values.timeoutMs = Number(options.timeout);
    if (options.verbose) values.verbose = true;

    const parsed = AgentConfigSchema.safeParse(values);
    if (!parsed.success) {
      const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new Error(`Invalid configuration: ${details}`);
    }

    this.ledgerUrl = parsed.data.ledgerUrl;
    this.difficulty = parsed.data.difficulty;
    this.recheckInterval = parsed.data.recheckInterval;
    this.timeoutMs = parsed.data.timeoutMs;
    this.taintedDelayMs = parsed.data.taintedDelayMs;
    this.rejectBackoffMs = parsed.data.rejectBackoffMs;
    this.retryDelayMs = parsed.data.retryDelayMs;
    this.verbose = parsed.data.verbose;
  }

  private loadConfigFile(warn: ConfigWarning): Partial<AgentConfig> {
    if (!existsSync(this.configPath)) {
      return {};
    }
    try {
      const content = readFileSync(this.configPath, 'utf-8');
      const parsed = ConfigFileSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        warn(`Ignoring invalid config file ${this.configPath}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
        return {};
      }
      return parsed.data;
    } catch (err) {
      warn(`Ignoring unreadable config file ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`);
      return {};
    }
  }

  toJSON(): AgentConfig {
    return {
      ledgerUrl: this.ledgerUrl,
      difficulty: this.difficulty,
      recheckInterval: this.recheckInterval,
      timeoutMs: this.timeoutMs,
      taintedDelayMs: this.taintedDelayMs,
      rejectBackoffMs: this.rejectBackoffMs,
      retryDelayMs: this.retryDelayMs,
      verbose: this.verbose,
    };
  }
}
