import { z } from 'zod';
import { LAUNCH_MODES } from './types.js';

export const createSessionResponseSchema = z.object({
  session_id: z.string().min(1),
  websocket_path: z.string().min(1),
  sample_rate_hz: z.number().int().min(8_000).max(96_000),
  channels: z.number().int().min(1).max(2).default(1),
  audio_format: z.string().min(1).default('pcm16'),
  tts_output_format: z.string().min(1).default('pcm_16000'),
  max_input_seconds: z.number().positive(),
  chat_session_id: z.number().int(),
  launch_mode: z.enum(LAUNCH_MODES),
  content_context_attached: z.boolean().default(false),
});

export type CreateSessionResponse = z.infer<typeof createSessionResponseSchema>;

export const voiceHealthSchema = z.record(z.union([z.boolean(), z.string(), z.number(), z.null()]));

// Server frames are snake_case; camelCase keys are folded onto the same names before parsing.
export const inboundFrameSchema = z
  .object({
    type: z.string().min(1),
    turn_id: z.string().min(1).nullish(),
    text: z.string().nullish(),
    seq: z.number().int().min(0).nullish(),
    audio_b64: z.string().nullish(),
    format: z.string().nullish(),
    code: z.string().nullish(),
    message: z.string().nullish(),
    retryable: z.boolean().nullish(),
    latency_ms: z.number().min(0).nullish(),
    tts_enabled: z.boolean().nullish(),
    reason: z.string().nullish(),
    is_intro: z.boolean().nullish(),
    is_onboarding_intro: z.boolean().nullish(),
    turn_index: z.number().int().nullish(),
    stream_epoch: z.number().int().nullish(),
    rollback_turn_index: z.number().int().nullish(),
    chat_session_id: z.number().int().nullish(),
    session_id: z.string().nullish(),
  })
  .passthrough();

export type InboundFrame = z.infer<typeof inboundFrameSchema>;

export function snakeCaseKeys(value: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const snake = key.replace(/[A-Z]/g, (ch) => `_${ch.toLowerCase()}`);
    if (snake !== key && Object.prototype.hasOwnProperty.call(value, snake)) {
      continue;
    }
    out[snake] = entry;
  }
  return out;
}

export function formatZodIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid payload';
  const where = issue.path.length > 0 ? issue.path.join('.') : 'payload';
  return `${where}: ${issue.message}`;
}
