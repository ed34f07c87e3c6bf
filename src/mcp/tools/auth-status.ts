/**
 * Auth Status Tool
 *
 * Validates the stored session against the upstream service and reports
 * token age, recent failures and the MFA sources an operator can use.
 * Fires `tokens_expiring` when the tokens are past the aging thresholds.
 */

import { z } from 'zod';
import type { AuthContext } from '../../core/context.js';
import type { ToolFactory, LLMResponse } from '../types.js';
import { handleToolError } from '../utils/error-helpers.js';

const authStatusSchema = z.object({});

export const createAuthStatusTool: ToolFactory = (context: AuthContext) => ({
  name: 'auth-status',
  description:
    'Check whether the stored fitness API session is still valid and how old the tokens are. ' +
    'Lists the configured MFA code sources for when a fresh login is needed.',
  schema: authStatusSchema,

  handler: async (): Promise<LLMResponse> => {
    try {
      const status = await context.orchestrator.checkStatus();

      return {
        status: 'success',
        data: {
          ...status,
          state: context.orchestrator.getState(),
          timestamp: new Date().toISOString(),
        },
      };
    } catch (error) {
      return handleToolError(error, 'auth-status');
    }
  },
});
