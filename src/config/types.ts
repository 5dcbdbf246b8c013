export interface DatawiseConfig {
  readonly telegram: TelegramConfig;
  readonly ollama: OllamaConfig;
  readonly cleaning: CleaningConfig;
  readonly chat: ChatConfig;
  readonly logging?: LoggingConfig;
}

export interface TelegramConfig {
  readonly token?: string;
  readonly maxFileSizeMb: number;
  readonly allowedExtensions: string[];
}

export interface OllamaConfig {
  readonly baseUrl: string;
  readonly binary: string;
  /** Timeout of the API version probe. */
  readonly probeTimeoutMs: number;
  /** Timeout of `ollama list`, the process transport's probe. */
  readonly listTimeoutMs: number;
  readonly generateTimeoutMs: number;
  readonly maxPromptChars: number;
  readonly maxRetries: number;
  readonly retryBaseDelayMs: number;
}

export interface CleaningConfig {
  readonly model: string;
  readonly maxRows: number;
  readonly maxColumns: number;
  readonly sampleRows: number;
}

export interface ChatConfig {
  readonly model: string;
  readonly historyLimit: number;
  readonly contextBudgetChars: number;
  readonly systemPrompt: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
