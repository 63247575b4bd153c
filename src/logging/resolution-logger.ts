import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { AttemptEvent, ResolutionObserver, SettledEvent } from '../types/index.js';

/** Appends every attempt and every settled group to `<logDir>/resolution.jsonl`. */
export class ResolutionLogger implements ResolutionObserver {
  private logPath: string;
  private initialized = false;

  constructor(private logDir: string) {
    this.logPath = join(logDir, 'resolution.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.logDir, { recursive: true });
    this.initialized = true;
  }

  private async append(entry: Record<string, unknown>): Promise<void> {
    await this.ensureDir();
    const line = { timestamp: new Date().toISOString(), ...entry };
    await appendFile(this.logPath, JSON.stringify(line) + '\n', 'utf-8');
  }

  async onAttempt(event: AttemptEvent): Promise<void> {
    await this.append({
      type: 'attempt',
      ...event,
      selector: event.selector.toString(),
    });
  }

  async onSettled(event: SettledEvent): Promise<void> {
    await this.append({ type: 'settled', ...event });
  }

  getLogPath(): string {
    return this.logPath;
  }
}
