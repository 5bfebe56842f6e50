import type { Logger } from 'pino';
import type { TransportOptions } from '../api/types';
import type { Ask } from '../auth/prompt';
import type { AppConfig } from '../config';

/** What a workflow needs from the process it runs in. */
export interface WorkflowContext {
  config: AppConfig;
  logger: Logger;
  ask: Ask;
  /** Reads a token or password without echoing it. */
  askSecret: Ask;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  transport?: TransportOptions;
}
