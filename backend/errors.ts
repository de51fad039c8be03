/**
 * Error taxonomy for a pipeline run.
 *
 * Per-source failures (one feed, one image) are logged and skipped and never
 * reach these classes. A routine "nothing to do" outcome, such as no breaking
 * news this cycle, is a `null` result rather than an error.
 */

/** Hard, unexpected failure of a run. Callers alert on it. */
export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineError';
  }
}

/** Strict selection could not reach the requested story count. Fatal for the run. */
export class InsufficientArticlesError extends PipelineError {
  readonly requested: number;
  readonly found: number;

  constructor(requested: number, found: number, hint?: string) {
    super(`Not enough news fetched: ${found} (need ${requested})${hint ? `. ${hint}` : ''}`);
    this.name = 'InsufficientArticlesError';
    this.requested = requested;
    this.found = found;
  }
}

/** Image generation refused the prompt; the story needs a fallback prompt or a replacement. */
export class ContentPolicyError extends Error {
  readonly prompt: string;

  constructor(prompt: string) {
    super(`Content policy violation: ${prompt.slice(0, 50)}...`);
    this.name = 'ContentPolicyError';
    this.prompt = prompt;
  }
}

/** The encoder exited non-zero. Fatal for the content item; selection state is kept. */
export class RenderError extends PipelineError {
  readonly outputPath: string;

  constructor(outputPath: string, detail: string) {
    super(`FFmpeg error for ${outputPath}: ${detail.slice(0, 500)}`);
    this.name = 'RenderError';
    this.outputPath = outputPath;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
