import { adapterMessageSchema, type AdapterMessage, type HelloMessage } from '../../adapter/shared/protocol.js';

export function validateHello(msg: AdapterMessage): { ok: true; hello: HelloMessage } | { ok: false; reason: string } {
  if (msg.type !== 'hello') return { ok: false, reason: 'first message must be hello' };
  return { ok: true, hello: msg };
}

/** null for anything that is not JSON or not a known adapter message. */
export function parseAdapterEvent(raw: string): AdapterMessage | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = adapterMessageSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}
