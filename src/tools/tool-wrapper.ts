/**
 * Tool Wrapper Module
 *
 * Gives every command the same outer behavior:
 * parameters are validated against the tool's zod schema, a child logger
 * carries the tool name, and anything thrown inside the implementation is
 * turned into a failed Result.
 */

import type { z } from 'zod';
import type { Logger } from 'pino';
import { Failure, type Result } from '../domain/types';
import { ValidationError, isDevDropError, toDevDropError } from '../lib/errors';
import { createTimer } from '../lib/logger';
import type { ToolContext } from './types';

/**
 * Tool implementation signature
 * @template TParams - Validated parameters
 * @template TResult - Value on success
 */
export interface ToolImplementation<TParams, TResult> {
  (params: TParams, context: ToolContext, logger: Logger): Promise<Result<TResult>>;
}

/**
 * Tool handler signature after wrapping; takes raw (unvalidated) parameters
 */
export interface ToolHandler<TInput, TResult> {
  (params: TInput, context: ToolContext): Promise<Result<TResult>>;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function wrapTool<TSchema extends z.ZodTypeAny, TResult>(
  toolName: string,
  schema: TSchema,
  implementation: ToolImplementation<z.output<TSchema>, TResult>,
): ToolHandler<z.input<TSchema>, TResult> {
  return async (params, context) => {
    const logger = context.logger.child({ tool: toolName });

    const parsed = schema.safeParse(params);
    if (!parsed.success) {
      logger.debug({ params }, `${toolName}: invalid parameters`);
      return Failure(new ValidationError(`invalid ${toolName} options: ${describeIssues(parsed.error)}`));
    }

    const timer = createTimer(logger, toolName);
    try {
      const result = await implementation(parsed.data, context, logger);
      if (result.ok) {
        timer.end();
      } else {
        logger.debug({ code: result.error.code }, `${toolName} failed: ${result.error.message}`);
      }
      return result;
    } catch (error) {
      if (isDevDropError(error)) {
        logger.debug({ code: error.code }, `${toolName} failed: ${error.message}`);
      } else {
        timer.error(error);
      }
      return Failure(toDevDropError(error));
    }
  };
}
