/**
 * Base interface and class for MCP tool handlers
 */
import { ZodError } from 'zod';
import { McpToolResponse } from '../tool-types.js';
import { ValidationError, isNewsdexError } from '../../../shared/domain/errors.js';
import { Logger, getLogger } from '../../../shared/infrastructure/logging.js';

/**
 * JSON schema of a tool's arguments
 */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
}

/**
 * Tool definition as used in MCP SDK
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

/**
 * Base interface for all tool handlers
 */
export interface IToolHandler {
  getToolDefinitions(): ToolDefinition[];
  handles(name: string): boolean;
  handleToolCall(name: string, args: unknown): Promise<McpToolResponse>;
}

/**
 * Base abstract class for all tool handlers
 */
export abstract class BaseToolHandler implements IToolHandler {
  protected readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? getLogger();
  }

  abstract getToolDefinitions(): ToolDefinition[];

  abstract handleToolCall(name: string, args: unknown): Promise<McpToolResponse>;

  handles(name: string): boolean {
    return this.getToolDefinitions().some((tool) => tool.name === name);
  }

  protected createSuccessResponse(text: string): McpToolResponse {
    return {
      content: [{ type: 'text', text }]
    };
  }

  /**
   * Turn rejected arguments into a ValidationError response naming each issue
   */
  protected createValidationErrorResponse(tool: string, error: ZodError, input: unknown): McpToolResponse {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    this.logger.warn(`Invalid arguments for ${tool}`, 'BaseToolHandler.validate', { issues, input });
    return this.createStructuredErrorResponse(
      new ValidationError(`Invalid arguments for ${tool}: ${issues.join('; ')}`, { issues })
    );
  }

  /**
   * Create a structured error response with error type derived from the error object
   */
  protected createStructuredErrorResponse(error: unknown): McpToolResponse {
    let message = 'An unknown error occurred';
    let errorType = 'UnknownError';
    let errorCode = 'UNKNOWN';

    if (isNewsdexError(error)) {
      message = error.message;
      errorType = error.name;
      errorCode = error.errorCode;
    } else if (error instanceof Error) {
      message = error.message;
      errorType = error.name && error.name !== 'Error' ? error.name : 'GenericError';
      errorCode = 'GENERIC_ERROR';
    } else if (typeof error === 'string') {
      message = error;
      errorType = 'StringError';
      errorCode = 'STRING_ERROR';
    }

    return {
      isError: true,
      content: [{ type: 'text', text: message }],
      errorDetails: {
        type: errorType,
        code: errorCode
      }
    };
  }
}
