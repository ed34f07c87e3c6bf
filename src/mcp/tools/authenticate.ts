/**
 * Authenticate Tool
 *
 * Runs an authentication cycle: resumes the stored session when it is still
 * accepted, otherwise logs in again and resolves the MFA code headlessly.
 * The session bundle itself is never returned to the client.
 */

import { z } from 'zod';
import type { AuthContext } from '../../core/context.js';
import type { ToolFactory, LLMResponse } from '../types.js';
import { handleToolError } from '../utils/error-helpers.js';

const authenticateSchema = z.object({
  retry: z
    .boolean()
    .optional()
    .default(false)
    .describe('Repeat failed cycles according to the configured retry policy'),
});

export const createAuthenticateTool: ToolFactory = (context: AuthContext) => ({
  name: 'authenticate',
  description:
    'Authenticate to the fitness API. Reuses stored tokens when valid; otherwise performs a ' +
    'fresh login and obtains the MFA code from the configured sources.',
  schema: authenticateSchema,

  handler: async (params): Promise<LLMResponse> => {
    try {
      const { retry } = authenticateSchema.parse(params);
      const session = retry
        ? await context.orchestrator.authenticateWithRetry()
        : await context.orchestrator.authenticate();

      return {
        status: 'success',
        data: {
          authenticated: true,
          state: context.orchestrator.getState(),
          sessionCreatedAt: session.createdAt.toISOString(),
        },
      };
    } catch (error) {
      return handleToolError(error, 'authenticate');
    }
  },
});
