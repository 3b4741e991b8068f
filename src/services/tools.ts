import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

export type AdditionResult = {
  operation: 'addition';
  operand_a: number;
  operand_b: number;
  result: number;
  timestamp: string;
};

export type MultiplicationResult = {
  operation: 'multiplication';
  operand_x: number;
  operand_y: number;
  result: number;
  timestamp: string;
};

export function addNumbers(input: { a: number; b: number }, now: Date = new Date()): AdditionResult {
  return {
    operation: 'addition',
    operand_a: input.a,
    operand_b: input.b,
    result: input.a + input.b,
    timestamp: now.toISOString(),
  };
}

export function multiplyNumbers(input: { x: number; y: number }, now: Date = new Date()): MultiplicationResult {
  return {
    operation: 'multiplication',
    operand_x: input.x,
    operand_y: input.y,
    result: input.x * input.y,
    timestamp: now.toISOString(),
  };
}

function toCallToolResult(structured: AdditionResult | MultiplicationResult): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(structured) }],
    structuredContent: structured,
  };
}

const timestamp = z.string().describe('ISO 8601 time the result was computed');

/**
 * Names of every tool the server exposes, in registration order.
 */
export const TOOL_NAMES = ['add_numbers', 'multiply_numbers'] as const;

export function registerTools(server: McpServer): void {
  server.registerTool(
    'add_numbers',
    {
      title: 'Add numbers',
      description: 'Add two numbers together.',
      inputSchema: {
        a: z.number().describe('The first number to add'),
        b: z.number().describe('The second number to add'),
      },
      outputSchema: {
        operation: z.literal('addition'),
        operand_a: z.number(),
        operand_b: z.number(),
        result: z.number(),
        timestamp,
      },
    },
    async ({ a, b }, extra) => {
      logger.info('Tool invoked', { tool: 'add_numbers', clientId: extra.authInfo?.clientId });
      return toCallToolResult(addNumbers({ a, b }));
    },
  );

  server.registerTool(
    'multiply_numbers',
    {
      title: 'Multiply numbers',
      description: 'Multiply two numbers together.',
      inputSchema: {
        x: z.number().describe('The first number to multiply'),
        y: z.number().describe('The second number to multiply'),
      },
      outputSchema: {
        operation: z.literal('multiplication'),
        operand_x: z.number(),
        operand_y: z.number(),
        result: z.number(),
        timestamp,
      },
    },
    async ({ x, y }, extra) => {
      logger.info('Tool invoked', { tool: 'multiply_numbers', clientId: extra.authInfo?.clientId });
      return toCallToolResult(multiplyNumbers({ x, y }));
    },
  );
}
