/**
 * MCP error code definitions and error conversion
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import {
  ConfigError,
  DatabaseError,
  InvalidInputError,
  InvalidSearchConfigError,
  InvalidTitleError,
  LadderError,
  TransportError,
  WikiLadderError,
} from '../../shared/errors.js';

export const WIKILADDER_ERROR = {
  LADDER_ERROR: -32001,
  TRANSPORT_ERROR: -32002,
  DATABASE_ERROR: -32003,
  CONFIG_ERROR: -32004,
} as const;

export function toMcpError(error: unknown): McpError {
  if (error instanceof InvalidTitleError || error instanceof InvalidInputError) {
    return new McpError(ErrorCode.InvalidParams, error.message);
  }

  if (error instanceof ConfigError || error instanceof InvalidSearchConfigError) {
    return new McpError(
      WIKILADDER_ERROR.CONFIG_ERROR,
      `Configuration error: ${error.message}`,
    );
  }

  if (error instanceof TransportError) {
    return new McpError(
      WIKILADDER_ERROR.TRANSPORT_ERROR,
      `Wiki request failed: ${error.message}`,
    );
  }

  if (error instanceof DatabaseError) {
    return new McpError(
      WIKILADDER_ERROR.DATABASE_ERROR,
      `Database error: ${error.message}`,
    );
  }

  if (error instanceof LadderError) {
    return new McpError(
      WIKILADDER_ERROR.LADDER_ERROR,
      `Search failed: ${error.message}`,
    );
  }

  if (error instanceof WikiLadderError) {
    return new McpError(ErrorCode.InternalError, error.message);
  }

  return new McpError(
    ErrorCode.InternalError,
    error instanceof Error ? error.message : 'Unknown error',
  );
}
