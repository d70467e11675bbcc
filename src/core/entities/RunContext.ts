/**
 * Per-run context shared between the rendered prompt and the tools
 */
export interface RunContext {
  inputs: Record<string, unknown>;
  metadata: Record<string, unknown>;
}

export function createRunContext(partial: Partial<RunContext> = {}): RunContext {
  return {
    inputs: { ...(partial.inputs ?? {}) },
    metadata: { ...(partial.metadata ?? {}) },
  };
}

/**
 * Fresh `inputs` and `metadata` maps for one run. Entries are shared by
 * reference, so functions and class instances stay usable.
 */
export function cloneRunContext(context: RunContext): RunContext {
  return createRunContext(context);
}
