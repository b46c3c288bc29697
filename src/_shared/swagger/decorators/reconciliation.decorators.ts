import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

const reportSchema = {
  type: 'object',
  properties: {
    runId: { type: 'string', format: 'uuid' },
    changed: { type: 'number', example: 3 },
    unchanged: { type: 'number', example: 120 },
    unrecognized: { type: 'number', example: 0 },
    failed: { type: 'number', example: 1 },
    recovery: {
      type: 'object',
      properties: {
        examined: { type: 'number' },
        skipped: { type: 'number' },
        completed: { type: 'number' },
        pending: { type: 'number' },
        unsettled: { type: 'number' },
        failed: { type: 'number' },
        error: { type: 'string' },
      },
    },
    startedAt: { type: 'string', format: 'date-time' },
    finishedAt: { type: 'string', format: 'date-time' },
  },
};

export const ApiRunReconciliation = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Run a reconciliation pass now',
      description:
        'Refreshes every non-final checkout against the gateway, then repairs recent failed PayPal orders',
    }),
    ApiResponse({ status: 200, description: 'Run report', schema: reportSchema }),
    ApiResponse({ status: 409, description: 'A run is already in progress' }),
  );
};

export const ApiLastReconciliation = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Report of the last completed run' }),
    ApiResponse({ status: 200, description: 'Run report', schema: reportSchema }),
    ApiResponse({ status: 404, description: 'No run completed yet' }),
  );
};
