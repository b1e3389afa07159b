import Conf from 'conf';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

// Zod schemas for validation
const BackendConfigSchema = z.object({
  url: z.string().url(),
  model: z.string().min(1),
});

const GenerationConfigSchema = z.object({
  temperature: z.number().min(0).max(1).optional(),
  maxTokens: z.number().int().positive().optional(),
});

const BudgetConfigSchema = z.object({
  contextWindow: z.number().int().positive().optional(),
  operationHistoryTokens: z.number().int().positive().optional(),
});

export const KilnConfigSchema = z.object({
  backend: BackendConfigSchema.optional(),
  generation: GenerationConfigSchema.optional(),
  budget: BudgetConfigSchema.optional(),
  workspace: z.object({
    defaultDir: z.string().min(1).optional(),
  }).optional(),
  debug: z.boolean().default(false),
});

export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type BudgetConfig = z.infer<typeof BudgetConfigSchema>;
export type KilnConfig = z.infer<typeof KilnConfigSchema>;

export class ConfigManager {
  private store: Conf<KilnConfig>;
  private static instance: ConfigManager;

  private constructor() {
    this.store = new Conf<KilnConfig>({
      projectName: 'kiln',
    });
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  isConfigured(): boolean {
    return this.store.get('backend') !== undefined;
  }

  getConfig(): KilnConfig {
    return this.store.store;
  }

  setBackend(config: BackendConfig) {
    const validated = BackendConfigSchema.parse(config);
    this.store.set('backend', validated);
  }

  getBackend(): BackendConfig | undefined {
    return this.store.get('backend');
  }

  setGeneration(config: GenerationConfig) {
    const validated = GenerationConfigSchema.parse(config);
    this.store.set('generation', validated);
  }

  getGeneration(): GenerationConfig | undefined {
    return this.store.get('generation');
  }

  setBudget(config: BudgetConfig) {
    const validated = BudgetConfigSchema.parse(config);
    this.store.set('budget', validated);
  }

  getBudget(): BudgetConfig | undefined {
    return this.store.get('budget');
  }

  setDefaultWorkspace(dir: string) {
    this.store.set('workspace', { defaultDir: dir });
  }

  getDefaultWorkspace(): string | undefined {
    return this.store.get('workspace')?.defaultDir;
  }

  setDebug(enabled: boolean) {
    this.store.set('debug', enabled);
  }

  isDebug(): boolean {
    return this.store.get('debug', false);
  }

  reset() {
    this.store.clear();
  }

  getConfigPath(): string {
    return this.store.path;
  }

  /**
   * Validate stored configuration and throw if invalid
   */
  validateConfig(): KilnConfig {
    const parsed = KilnConfigSchema.safeParse(this.getConfig());
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(
        `Stored configuration is invalid at ${issue.path.join('.') || '(root)'}: ${issue.message}. Run "kiln config reset".`
      );
    }
    return parsed.data;
  }
}

export const configManager = ConfigManager.getInstance();
