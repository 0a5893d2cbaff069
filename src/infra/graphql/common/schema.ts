/**
 * Common GraphQL schema
 * Definitions shared by every module schema
 */

import { CommonScalars } from './scalars.js';

/**
 * Combined common schema for use in GraphQL schema composition
 * Import this in build-app.ts and include it in the schema array
 */
export const CommonGraphQLSchema = [CommonScalars].join('\n\n');
