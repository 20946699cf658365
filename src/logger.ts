import pino from 'pino';
import type { Logger } from 'pino';

const level = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

export const logger = pino({
  name: 'live-voice-client',
  level,
  transport:
    process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'test'
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
          },
        },
});

export type ComponentName =
  | 'voice_negotiator'
  | 'voice_transport'
  | 'voice_audio'
  | 'voice_turns'
  | 'voice_session';

export function componentLogger(component: ComponentName, bindings?: Record<string, unknown>): Logger {
  return logger.child({ component, ...bindings });
}
