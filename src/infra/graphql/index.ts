import { makeExecutableSchema, type IExecutableSchemaDefinition } from '@graphql-tools/schema';
import {
  NoSchemaIntrospectionCustomRule,
  Kind,
  type ValidationRule,
  type DocumentNode,
  type OperationDefinitionNode,
  type FieldNode,
} from 'graphql';
import depthLimit from 'graphql-depth-limit';
import mercuriusPlugin, { type IResolvers, type MercuriusContext } from 'mercurius';

import type { FastifyPluginAsync } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Security Constants
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maximum allowed query depth.
 * Report queries nest three levels deep (query, result, rows).
 */
const MAX_QUERY_DEPTH = 8;

// ─────────────────────────────────────────────────────────────────────────────
// GraphQL Logging Utilities
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Extracts operation info from a GraphQL document AST.
 * Returns the first operation's name and type.
 */
function extractOperationInfo(document: DocumentNode): {
  operationName: string | null;
  operationType: string;
} {
  const operation = document.definitions.find(
    (def): def is OperationDefinitionNode => def.kind === Kind.OPERATION_DEFINITION
  );

  return {
    operationName: operation?.name?.value ?? null,
    operationType: operation?.operation ?? 'unknown',
  };
}

/**
 * Extracts the top-level field names being queried.
 * E.g., for `query { salesByYear { rows { year } } health { status } }` returns ['salesByYear', 'health']
 */
function extractFieldNames(document: DocumentNode): string[] {
  const operation = document.definitions.find(
    (def): def is OperationDefinitionNode => def.kind === Kind.OPERATION_DEFINITION
  );

  if (operation?.selectionSet === undefined) {
    return [];
  }

  return operation.selectionSet.selections
    .filter((sel): sel is FieldNode => sel.kind === Kind.FIELD)
    .map((field) => field.name.value);
}

// Re-export common GraphQL utilities
export { CommonScalars, CommonGraphQLSchema } from './common/index.js';
export { BaseSchema } from './schema.js';

export interface GraphQLOptions {
  schema: string[];
  resolvers: IResolvers[];
  /** Serve the GraphiQL IDE (defaults to on outside production) */
  enableGraphiQL?: boolean;
}

/**
 * Creates the GraphQL plugin with the provided resolvers
 *
 * - Query depth limiting
 * - Introspection disabled in production
 */
export const makeGraphQLPlugin = (options: GraphQLOptions): FastifyPluginAsync => {
  const {
    schema: baseSchema,
    resolvers,
    enableGraphiQL = process.env['NODE_ENV'] !== 'production',
  } = options;

  // mercurius and graphql-tools declare incompatible resolver map types
  const schema = makeExecutableSchema({
    typeDefs: baseSchema,
    resolvers,
  } as IExecutableSchemaDefinition);

  // Determine if running in production
  const isProduction = process.env['NODE_ENV'] === 'production';

  // Depth limiting is always on; introspection is off in production
  const validationRules: ValidationRule[] = [
    depthLimit(MAX_QUERY_DEPTH) as ValidationRule,
    ...(isProduction ? [NoSchemaIntrospectionCustomRule] : []),
  ];

  return async (fastify) => {
    await fastify.register(mercuriusPlugin, {
      schema,
      graphiql: enableGraphiQL,
      path: '/graphql',
      validationRules,
    });

    // ─────────────────────────────────────────────────────────────────────────
    // GraphQL Operation Logging
    // ─────────────────────────────────────────────────────────────────────────
    // Log GraphQL operations with useful context for observability.
    // Uses Mercurius hooks to capture operation details after execution.

    // Documents seen in preExecution, keyed by request context
    const documents = new WeakMap<MercuriusContext, DocumentNode>();

    fastify.graphql.addHook('preExecution', (_schema, document, context) => {
      documents.set(context, document);
    });

    fastify.graphql.addHook('onResolution', (execution, context) => {
      const document = documents.get(context);

      // Extract operation info if document is available
      let operationName: string | null = null;
      let operationType = 'unknown';
      let fields: string[] = [];

      if (document !== undefined) {
        const opInfo = extractOperationInfo(document);
        operationName = opInfo.operationName;
        operationType = opInfo.operationType;
        fields = extractFieldNames(document);
      }

      // Determine if there were errors
      const hasErrors = execution.errors !== undefined && execution.errors.length > 0;
      const errorCount = execution.errors?.length ?? 0;

      // Build log entry
      const logEntry = {
        graphql: {
          operationType,
          operationName,
          fields,
          hasErrors,
          errorCount,
        },
      };

      // Log at appropriate level
      if (hasErrors) {
        context.reply.log.warn(
          { ...logEntry, errors: execution.errors },
          `GraphQL ${operationType} "${operationName ?? 'anonymous'}" completed with ${String(errorCount)} error(s)`
        );
      } else {
        context.reply.log.info(
          logEntry,
          `GraphQL ${operationType} "${operationName ?? 'anonymous'}" [${fields.join(', ')}]`
        );
      }
    });
  };
};
