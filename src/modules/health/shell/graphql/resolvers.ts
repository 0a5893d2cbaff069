import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { IResolvers } from 'mercurius';

/**
 * Factory function to create health resolvers with dependencies
 */
export const makeHealthResolvers = (deps: Partial<GetReadinessDeps> = {}): IResolvers => {
  const { version, checkers = [] } = deps;

  return {
    Query: {
      health: () => 'ok',
      ready: async () => {
        // Process uptime, unlike the REST endpoint which counts from route registration
        const uptime = process.uptime();
        const timestamp = new Date().toISOString();

        return getReadiness({ version, checkers }, { uptime, timestamp });
      },
    },
  };
};
