import type { ExecutionContext } from '../../types/execution-context.js';
import { consoleOutput } from './console-output.js';
import type { OutputPort } from './output.js';

/** The context's OutputPort, or the console when the context carries none. */
export function resolveOutput(ctx?: Pick<ExecutionContext, 'output'>): OutputPort {
  return ctx?.output ?? consoleOutput;
}
