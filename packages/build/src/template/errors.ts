/**
 * Template failures. The message is the full diagnostic, e.g.
 * `template: tmpl:1: unexpected "}" in operand`.
 */

export enum TemplatePhase {
  Parse = 'parse',
  Execute = 'execute'
}

export class TemplateError extends Error {
  public override readonly name = 'TemplateError';
  public readonly phase: TemplatePhase;

  constructor(phase: TemplatePhase, message: string, options: { cause?: unknown } = {}) {
    super(message);
    this.phase = phase;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, TemplateError.prototype);
  }
}

/** Template name used in diagnostics */
export const TEMPLATE_NAME = 'tmpl';
