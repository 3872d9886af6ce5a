import type { Message } from './message.js';
import type { CapabilityParameters } from './capability.js';

/** Selects the capability for a message/send or message/stream call. */
export interface MessageSendMetadata extends Record<string, unknown> {
  capability?: string;
  parameters?: CapabilityParameters;
}

// ---------- message/send, message/stream ----------

export interface MessageSendParams {
  message: Message;
  metadata?: MessageSendMetadata;
}

// ---------- tasks/get, tasks/cancel ----------

export interface TaskIdParams {
  id: string;
}
