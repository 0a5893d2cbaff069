/**
 * Sales Reports REST Routes
 *
 * - GET /api/v1/reports: Report catalogue
 * - GET /api/v1/reports/all: Every report as a table
 * - GET /api/v1/reports/:reportId: One report as a table
 */

import {
  ErrorResponseSchema,
  ReportCatalogueResponseSchema,
  ReportParamsSchema,
  ReportQuerySchema,
  ReportTableResponseSchema,
  ReportTablesResponseSchema,
  type ReportParams,
  type ReportQuery,
} from './schemas.js';
import {
  createNotFoundError,
  getHttpStatusForError,
  type SalesReportError,
} from '../../core/errors.js';
import { toReportTable } from '../../core/table.js';
import { isSalesReportId, type SalesReportDefaults } from '../../core/types.js';
import { listSalesReports } from '../../core/usecases/list-sales-reports.js';
import { runAllSalesReports } from '../../core/usecases/run-all-sales-reports.js';
import { runSalesReport } from '../../core/usecases/run-sales-report.js';

import type { SalesReportRepository } from '../../core/ports.js';
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for sales report routes.
 */
export interface MakeSalesReportsRoutesDeps {
  salesReportRepo: SalesReportRepository;
  defaults: SalesReportDefaults;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const errorResponses = {
  400: ErrorResponseSchema,
  404: ErrorResponseSchema,
  500: ErrorResponseSchema,
  504: ErrorResponseSchema,
};

/**
 * Logs a failed report run and sends the mapped error response.
 * Client errors are logged at warn, data source failures at error.
 */
function sendError(
  request: FastifyRequest,
  reply: FastifyReply,
  error: SalesReportError,
  report: string
) {
  const status = getHttpStatusForError(error);
  const logContext = { err: error, errorType: error.type, report };

  if (status >= 500) {
    request.log.error(logContext, `[${error.type}] ${error.message}`);
  } else {
    request.log.warn(logContext, `[${error.type}] ${error.message}`);
  }

  return reply.status(status).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates sales report REST routes.
 */
export const makeSalesReportsRoutes = (deps: MakeSalesReportsRoutesDeps): FastifyPluginAsync => {
  const runDeps = { salesReportRepo: deps.salesReportRepo, defaults: deps.defaults };

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/reports - Catalogue
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/reports',
      {
        schema: {
          response: {
            200: ReportCatalogueResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        return reply.status(200).send({
          ok: true,
          data: listSalesReports(),
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/reports/all - Whole catalogue, run concurrently
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: ReportQuery }>(
      '/api/v1/reports/all',
      {
        schema: {
          querystring: ReportQuerySchema,
          response: {
            200: ReportTablesResponseSchema,
            ...errorResponses,
          },
        },
      },
      async (request, reply) => {
        const result = await runAllSalesReports(runDeps, request.query);

        if (result.isErr()) {
          return sendError(request, reply, result.error, 'all');
        }

        return reply.status(200).send({
          ok: true,
          data: result.value.map(toReportTable),
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/reports/:reportId - One report
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: ReportParams; Querystring: ReportQuery }>(
      '/api/v1/reports/:reportId',
      {
        schema: {
          params: ReportParamsSchema,
          querystring: ReportQuerySchema,
          response: {
            200: ReportTableResponseSchema,
            ...errorResponses,
          },
        },
      },
      async (request, reply) => {
        const { reportId } = request.params;

        if (!isSalesReportId(reportId)) {
          return sendError(request, reply, createNotFoundError('Sales report', reportId), reportId);
        }

        const result = await runSalesReport(runDeps, { report: reportId, params: request.query });

        if (result.isErr()) {
          return sendError(request, reply, result.error, reportId);
        }

        return reply.status(200).send({
          ok: true,
          data: toReportTable(result.value),
        });
      }
    );
  };
};
