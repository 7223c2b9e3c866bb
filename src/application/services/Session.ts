import { randomUUID } from 'crypto';
import type { Config, ModeConfig } from '../../core/entities/Settings.js';
import type { ITranscriptRepository } from '../../core/interfaces/ITranscriptRepository.js';
import { ConversationService, DEFAULT_CONTEXT_CAPACITY } from './ConversationService.js';
import { PricingLedger } from './PricingLedger.js';

export interface SessionOptions {
  id?: string;
  capacity?: number;
  transcriptRepo?: ITranscriptRepository;
}

export function modeConfigFrom(config: Config): ModeConfig {
  return Object.freeze({
    interaction_mode: config.ai_mode,
    language: config.language,
    analysis_context: config.analysis_context,
  });
}

/**
 * One design session: resolved settings, the active mode, conversation memory
 * and pricing request bookkeeping. Owned by the caller and passed to every
 * orchestrator call.
 */
export class Session {
  readonly id: string;
  readonly context: ConversationService;
  readonly pricing = new PricingLedger();
  private currentConfig: Config;
  private currentMode: ModeConfig;

  constructor(config: Config, options: SessionOptions = {}) {
    this.id = options.id ?? randomUUID();
    this.context = new ConversationService(this.id, options.capacity ?? DEFAULT_CONTEXT_CAPACITY, options.transcriptRepo);
    this.currentConfig = { ...config };
    this.currentMode = modeConfigFrom(config);
  }

  get config(): Config {
    return this.currentConfig;
  }

  get mode(): ModeConfig {
    return this.currentMode;
  }

  /**
   * Adopt settings that were just saved. The mode follows the saved settings;
   * conversation memory is kept.
   */
  applyConfig(config: Config): void {
    this.currentConfig = { ...config };
    this.currentMode = modeConfigFrom(config);
  }
}
