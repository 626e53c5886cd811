/**
 * Template rendering for binary names and compiler flags
 */

import { BuildError, BuildErrorCode, Context } from '@crossbuild/core';
import { TemplateError, TemplatePhase } from './errors';
import { execute } from './exec';
import { artifactFields, ArtifactFields, contextFields } from './fields';
import { createFunctions } from './functions';
import { parse, Tree } from './parser';
import { FunctionMap, TemplateValue } from './values';

/**
 * A parsed template
 */
export class Template {
  private constructor(
    private readonly tree: Tree,
    private readonly functions: FunctionMap
  ) {}

  /**
   * Parse template text, throwing a TemplateError on syntax errors
   */
  static parse(text: string, functions: FunctionMap): Template {
    return new Template(parse(text, new Set(functions.keys())), functions);
  }

  /**
   * Render against data, throwing a TemplateError on execution errors
   */
  execute(data: TemplateValue): string {
    return execute(this.tree, data, this.functions);
  }
}

/**
 * Renders templates against the run context and, optionally, one target.
 * Renderers are immutable; `withArtifact` and `withFields` return new ones.
 */
export class TemplateRenderer {
  private constructor(
    private readonly fields: ReadonlyMap<string, TemplateValue>,
    private readonly functions: FunctionMap
  ) {}

  /**
   * Renderer for run-wide fields
   */
  static forContext(ctx: Context): TemplateRenderer {
    return new TemplateRenderer(contextFields(ctx), createFunctions(ctx.clock));
  }

  /**
   * Renderer with the fields of one target added
   */
  withArtifact(artifact: ArtifactFields): TemplateRenderer {
    return this.withFields(artifactFields(artifact));
  }

  /**
   * Renderer with extra fields; later fields win
   */
  withFields(extra: ReadonlyMap<string, TemplateValue>): TemplateRenderer {
    return new TemplateRenderer(new Map([...this.fields, ...extra]), this.functions);
  }

  /**
   * Render template text. Failures are BuildErrors whose message is the
   * template diagnostic unchanged.
   */
  apply(source: string): string {
    try {
      return Template.parse(source, this.functions).execute(this.fields);
    } catch (error) {
      if (error instanceof TemplateError) {
        const code =
          error.phase === TemplatePhase.Parse
            ? BuildErrorCode.TemplateParse
            : BuildErrorCode.TemplateExecution;
        throw new BuildError(code, error.message, { cause: error });
      }
      throw error;
    }
  }
}
