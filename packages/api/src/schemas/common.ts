import { Type, type Static } from '@sinclair/typebox';

export const ErrorResponseSchema = Type.Object({
  error: Type.Object({
    statusCode: Type.Number(),
    message: Type.String(),
    requestId: Type.String(),
    code: Type.Optional(Type.String()),
    details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  }),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;

export const HealthResponseSchema = Type.Object({
  status: Type.Union([Type.Literal('healthy'), Type.Literal('unhealthy')]),
  timestamp: Type.String(),
  service: Type.String(),
  version: Type.String(),
  database: Type.Optional(
    Type.Object({
      connected: Type.Boolean(),
      latencyMs: Type.Optional(Type.Number()),
    })
  ),
});

export type HealthResponse = Static<typeof HealthResponseSchema>;

export const CalendarDateString = Type.String({
  pattern: '^\\d{4}-\\d{2}-\\d{2}$',
  description: 'UTC calendar day, YYYY-MM-DD',
});

export const RejectedInputSchema = Type.Object({
  id: Type.String(),
  code: Type.String(),
  reason: Type.String(),
});

export const PersistFailureSchema = Type.Object({
  id: Type.String(),
  stage: Type.String(),
  reason: Type.String(),
});
