import { EventEmitter } from 'events';

/** Destino de las líneas de log. El host puede aportar el suyo. */
export interface OutputChannel {
  appendLine(line: string): void;
  show(): void;
  clear(): void;
}

const DEFAULT_MAX_LINES = 1000;

/**
 * Canal en memoria: guarda las últimas líneas y emite `line` por cada una,
 * para que el host las reenvíe donde quiera (fichero, consola, panel).
 */
export class MemoryOutputChannel extends EventEmitter implements OutputChannel {
  private lines: string[] = [];

  constructor(private readonly maxLines: number = DEFAULT_MAX_LINES) {
    super();
  }

  appendLine(line: string): void {
    this.lines.push(line);
    if (this.lines.length > this.maxLines) {
      this.lines.splice(0, this.lines.length - this.maxLines);
    }
    this.emit('line', line);
  }

  show(): void {
    this.emit('show', this.getLines());
  }

  clear(): void {
    this.lines = [];
  }

  getLines(): string[] {
    return [...this.lines];
  }
}

/**
 * Logger central que escribe en el canal de salida del tabline.
 * Usar para mensajes importantes y errores (no para traza detallada).
 */
export class Logger {
  private static outputChannel: OutputChannel | undefined;

  /** Asigna el canal de salida. Llamar una vez desde `activate()`. */
  static initialize(channel: OutputChannel = new MemoryOutputChannel()): void {
    this.outputChannel = channel;
  }

  static getChannel(): OutputChannel {
    if (!this.outputChannel) {
      this.outputChannel = new MemoryOutputChannel();
    }
    return this.outputChannel;
  }

  /** Registra un mensaje informativo con marca temporal. */
  static log(message: string): void {
    const timestamp = new Date().toISOString();
    this.getChannel().appendLine(`[${timestamp}] ${message}`);
  }

  /** Registra una advertencia. */
  static warn(message: string): void {
    this.log(`WARN: ${message}`);
  }

  /** Registra un error; si hay objeto Error también escribe su stack. */
  static error(message: string, error?: unknown): void {
    this.log(`ERROR: ${message}`);
    if (error instanceof Error) {
      this.log(error.message);
      if (error.stack) {
        this.log(error.stack);
      }
    }
  }

  /** Muestra el canal de salida en la UI del host. */
  static show(): void {
    this.getChannel().show();
  }
}
