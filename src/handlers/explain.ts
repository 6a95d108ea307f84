import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { PipelineFactory } from '../services/pipeline-factory';
import { ReportGeneratorService } from '../services/report-generator';
import { WorkflowOrchestrator } from '../services/workflow-orchestrator';
import { ConfigurationError } from '../types/errors';
import { ValidationError } from '../types/validation';
import { RunRequest } from '../types/run-state';

/**
 * Error response body structure
 */
interface ErrorResponseBody {
  error: string;
  code: string;
  details?: ValidationError[];
}

/**
 * Common CORS headers for all responses
 */
const CORS_HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization',
  'Access-Control-Allow-Methods': 'POST,OPTIONS'
};

/**
 * Create a success response
 */
function successResponse<T>(data: T, statusCode = 200): APIGatewayProxyResult {
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(data)
  };
}

/**
 * Create an error response
 */
function errorResponse(
  statusCode: number,
  message: string,
  code: string,
  details?: ValidationError[]
): APIGatewayProxyResult {
  const body: ErrorResponseBody = {
    error: message,
    code,
    ...(details && { details })
  };
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(body)
  };
}

/**
 * Parse JSON body safely
 */
function parseBody(event: APIGatewayProxyEvent): Record<string, unknown> | null {
  if (!event.body) return null;
  try {
    const parsed: unknown = JSON.parse(event.body);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return null;
    }
    return { ...parsed };
  } catch {
    return null;
  }
}

let orchestrator: WorkflowOrchestrator | null = null;

/**
 * Lazily build the orchestrator once per container
 */
function getOrchestrator(): WorkflowOrchestrator {
  if (!orchestrator) {
    orchestrator = PipelineFactory.create();
  }
  return orchestrator;
}

/**
 * Drop the cached orchestrator so the next request re-reads the environment
 */
export function resetOrchestrator(): void {
  orchestrator = null;
}

/**
 * POST /explain
 *
 * Run the news/pattern explanation pipeline for a ticker and date range.
 * 200 with the report when the run completes, 422 when it ends FAILED.
 */
export async function explain(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const body = parseBody(event);
    if (!body) {
      return errorResponse(400, 'Invalid request body', 'INVALID_BODY');
    }

    const validationErrors: ValidationError[] = [];
    for (const field of ['ticker', 'startDate', 'endDate']) {
      if (typeof body[field] !== 'string' || body[field] === '') {
        validationErrors.push({ field, code: 'REQUIRED', message: `${field} is required` });
      }
    }
    const { ticker, startDate, endDate } = body;
    if (
      validationErrors.length > 0 ||
      typeof ticker !== 'string' ||
      typeof startDate !== 'string' ||
      typeof endDate !== 'string'
    ) {
      return errorResponse(400, 'Validation failed', 'VALIDATION_FAILED', validationErrors);
    }

    const request: RunRequest = { ticker, startDate, endDate };
    const outcome = await getOrchestrator().run(request);

    if (outcome.status === 'DONE') {
      return successResponse({
        status: outcome.status,
        report: outcome.report,
        markdown: ReportGeneratorService.renderMarkdown(outcome.report),
        warnings: outcome.warnings
      });
    }

    return successResponse({
      status: outcome.status,
      failure: outcome.failure,
      warnings: outcome.warnings
    }, 422);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return errorResponse(400, error.message, error.code, error.details);
    }
    console.error('Error running explanation pipeline:', error);
    return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
  }
}

/**
 * Main handler that routes requests based on HTTP method and path
 */
export async function handler(
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> {
  // Handle CORS preflight
  if (event.httpMethod === 'OPTIONS') {
    return {
      statusCode: 200,
      headers: CORS_HEADERS,
      body: ''
    };
  }

  if (event.httpMethod === 'POST' && event.path === '/explain') {
    return explain(event);
  }

  return errorResponse(404, 'Route not found', 'NOT_FOUND');
}
