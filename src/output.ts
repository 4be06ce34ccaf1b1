/**
 * Output abstraction for session events
 * Injected into the orchestrator, channel and CLI so tests can record or silence it
 */

export interface Output {
  print(message: string): Promise<void>;
  printJson(data: unknown): Promise<void>;
  error(message: string): Promise<void>;
  success(message: string): Promise<void>;
  warning(message: string): Promise<void>;
  info(message: string): Promise<void>;
  debug(message: string): Promise<void>;
}

export interface ConsoleOutputOptions {
  prefix?: string;
  debug?: boolean;
}

function jsonReplacer(_: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Uint8Array) {
    return `<${value.length} bytes>`;
  }
  return value;
}

/**
 * Console output implementation
 */
export class ConsoleOutput implements Output {
  private readonly prefix: string;
  private readonly debugEnabled: boolean;

  constructor(options: ConsoleOutputOptions = {}) {
    this.prefix = options.prefix ? `${options.prefix} ` : '';
    this.debugEnabled = options.debug ?? Boolean(process.env.DEBUG);
  }

  async print(message: string): Promise<void> {
    console.log(message);
  }

  async printJson(data: unknown): Promise<void> {
    console.log(JSON.stringify(data, jsonReplacer, 2));
  }

  async error(message: string): Promise<void> {
    console.error(`${this.prefix}❌ ${message}`);
  }

  async success(message: string): Promise<void> {
    console.log(`${this.prefix}✅ ${message}`);
  }

  async warning(message: string): Promise<void> {
    console.warn(`${this.prefix}⚠️  ${message}`);
  }

  async info(message: string): Promise<void> {
    console.log(`${this.prefix}ℹ️  ${message}`);
  }

  async debug(message: string): Promise<void> {
    if (this.debugEnabled) {
      console.debug(`${this.prefix}🔍 ${message}`);
    }
  }
}

/**
 * Discards everything
 */
export class SilentOutput implements Output {
  async print(): Promise<void> {}
  async printJson(): Promise<void> {}
  async error(): Promise<void> {}
  async success(): Promise<void> {}
  async warning(): Promise<void> {}
  async info(): Promise<void> {}
  async debug(): Promise<void> {}
}

/**
 * Recording output for tests
 */
export class MockOutput implements Output {
  messages: string[] = [];
  errors: string[] = [];
  successes: string[] = [];
  warnings: string[] = [];
  infos: string[] = [];
  debugs: string[] = [];

  async print(message: string): Promise<void> {
    this.messages.push(message);
  }

  async printJson(data: unknown): Promise<void> {
    this.messages.push(JSON.stringify(data, jsonReplacer));
  }

  async error(message: string): Promise<void> {
    this.errors.push(message);
  }

  async success(message: string): Promise<void> {
    this.successes.push(message);
  }

  async warning(message: string): Promise<void> {
    this.warnings.push(message);
  }

  async info(message: string): Promise<void> {
    this.infos.push(message);
  }

  async debug(message: string): Promise<void> {
    this.debugs.push(message);
  }

  clear(): void {
    this.messages = [];
    this.errors = [];
    this.successes = [];
    this.warnings = [];
    this.infos = [];
    this.debugs = [];
  }

  getAll(): string[] {
    return [
      ...this.errors.map(e => `ERROR: ${e}`),
      ...this.warnings.map(w => `WARN: ${w}`),
      ...this.infos.map(i => `INFO: ${i}`),
      ...this.successes.map(s => `SUCCESS: ${s}`),
      ...this.messages,
    ];
  }
}
