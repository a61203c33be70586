import { ASREngine } from '../types/enums.js';
import type { TranscriptResult, UsageRecord } from '../types/entities.js';
import type { ASRPort, ASRTranscript, TranscribeOptions } from '../ports/asr.port.js';
import type { ResultSinkPort } from '../ports/sink.port.js';
import type { UsagePort } from '../ports/usage.port.js';

export type ASRStep = ASRTranscript | Error;

/**
 * ASR engine whose answers are scripted per reference. A script is matched
 * when its key appears in the reference URL; once a script runs out (or when
 * none matches) the engine succeeds with a text derived from the reference.
 */
export class ScriptedASR implements ASRPort {
  readonly calls: Array<{ reference: string; options: TranscribeOptions }> = [];

  private scripts = new Map<string, ASRStep[]>();

  script(match: string, ...steps: ASRStep[]): this {
    this.scripts.set(match, [...(this.scripts.get(match) ?? []), ...steps]);
    return this;
  }

  static textFor(reference: string): string {
    return `transcript of ${new URL(reference).pathname.slice(1)}`;
  }

  async initialize(): Promise<void> {}

  getEngine(): ASREngine {
    return ASREngine.STUB;
  }

  async transcribe(reference: string, options: TranscribeOptions): Promise<ASRTranscript> {
    this.calls.push({ reference, options });

    for (const [match, steps] of this.scripts) {
      if (reference.includes(match) && steps.length > 0) {
        const step = steps.shift();
        if (step instanceof Error) throw step;
        if (step) return step;
      }
    }

    return { text: ScriptedASR.textFor(reference) };
  }

  callsFor(match: string): number {
    return this.calls.filter((call) => call.reference.includes(match)).length;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {}
}

/**
 * Sink that keeps every delivery. Duplicate deliveries overwrite each other
 * in the per-job view, as an idempotent receiver would.
 */
export class RecordingSink implements ResultSinkPort {
  readonly deliveries: TranscriptResult[] = [];

  private failures: Error[] = [];

  failNext(...errors: Error[]): this {
    this.failures.push(...errors);
    return this;
  }

  async deliver(result: TranscriptResult): Promise<void> {
    const failure = this.failures.shift();
    if (failure) throw failure;
    this.deliveries.push(result);
  }

  distinct(): Map<string, TranscriptResult> {
    return new Map(this.deliveries.map((result) => [result.object_key, result]));
  }

  async close(): Promise<void> {}
}

export class RecordingUsage implements UsagePort {
  readonly records: UsageRecord[] = [];

  constructor(private readonly failure?: Error) {}

  async record(usage: UsageRecord): Promise<void> {
    if (this.failure) throw this.failure;
    this.records.push(usage);
  }

  async close(): Promise<void> {}
}
