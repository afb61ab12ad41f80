import { APIGatewayProxyResult } from 'aws-lambda';
import { z } from 'zod';

export function jsonResponse(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

export function validationErrorResponse(error: z.ZodError): APIGatewayProxyResult {
  return jsonResponse(400, {
    error: 'Invalid request',
    details: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  });
}
