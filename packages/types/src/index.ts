import { z } from 'zod';

// Base envelope schema (for JSON messages)
export const EnvelopeSchema = z.object({
  type: z.string(),
  ts: z.number().int(),
  data: z.unknown().optional(),
});
export type Envelope<T = unknown> = z.infer<typeof EnvelopeSchema> & { data?: T };

// Client -> Server commands (JSON)
export const SpeakCommandSchema = EnvelopeSchema.extend({
  type: z.literal('speak'),
  data: z.object({
    lines: z.array(z.string()).min(1),
  }),
});
export type SpeakCommand = z.infer<typeof SpeakCommandSchema>;

export const PauseCommandSchema = EnvelopeSchema.extend({
  type: z.literal('pause'),
});
export type PauseCommand = z.infer<typeof PauseCommandSchema>;

export const ResumeCommandSchema = EnvelopeSchema.extend({
  type: z.literal('resume'),
});
export type ResumeCommand = z.infer<typeof ResumeCommandSchema>;

export const StopCommandSchema = EnvelopeSchema.extend({
  type: z.literal('stop'),
});
export type StopCommand = z.infer<typeof StopCommandSchema>;

export const ControlCommandSchema = z.discriminatedUnion('type', [
  SpeakCommandSchema,
  PauseCommandSchema,
  ResumeCommandSchema,
  StopCommandSchema,
]);
export type ControlCommand = z.infer<typeof ControlCommandSchema>;

// Server -> Client events (JSON)
export const LineStartSchema = EnvelopeSchema.extend({
  type: z.literal('line.start'),
  data: z.object({ text: z.string() }),
});
export type LineStart = z.infer<typeof LineStartSchema>;

export const LineEndSchema = EnvelopeSchema.extend({
  type: z.literal('line.end'),
  data: z.object({ text: z.string(), gapMs: z.number().nonnegative() }),
});
export type LineEnd = z.infer<typeof LineEndSchema>;

export const PipelineStateValues = ['running', 'stopping', 'stopped'] as const;
export type PipelineStateName = (typeof PipelineStateValues)[number];

export const PipelineStateSchema = EnvelopeSchema.extend({
  type: z.literal('pipeline.state'),
  data: z.object({
    state: z.enum(PipelineStateValues),
    paused: z.boolean(),
  }),
});
export type PipelineStateEvent = z.infer<typeof PipelineStateSchema>;

export const ErrorSchema = EnvelopeSchema.extend({
  type: z.literal('error'),
  data: z.object({
    code: z.string(),
    message: z.string(),
    recoverable: z.boolean().default(true),
    details: z.unknown().optional(),
  }),
});
export type ErrorEvent = z.infer<typeof ErrorSchema>;

export type ServerEvent = LineStart | LineEnd | PipelineStateEvent | ErrorEvent;

export function nowTs(): number {
  return Date.now();
}
