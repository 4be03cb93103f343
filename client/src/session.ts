import { UserInfo } from './types';
import { isResultResponse } from './http';
import { OekoboxValidationError } from './errors';
import type { Transport } from './transport';

const SESSION_COOKIES = ['JSESSIONID', 'OOSESSION', 'sessionid'];

/** Pull the shop's session cookie out of a response, if it set one */
export function extractSessionId(headers: Headers): string | null {
  const raw = headers.get('set-cookie');
  if (!raw) return null;
  for (const name of SESSION_COOKIES) {
    const match = new RegExp(`(?:^|[;,]\\s*)${name}=([^;,\\s]+)`).exec(raw);
    if (match) return match[1];
  }
  return null;
}

function optionalString(value: unknown): string | null {
  if (typeof value === 'string' && value) return value;
  if (typeof value === 'number') return String(value);
  return null;
}

/**
 * Log on with customer id (or e-mail) and password.
 * Rejected credentials surface from the transport as OekoboxAuthenticationError.
 */
export async function logon(
  transport: Transport,
  username: string,
  password: string,
): Promise<UserInfo> {
  const data = await transport.get('logon', {
    query: { cid: username, pass: password },
  });

  if (!isResultResponse(data)) {
    throw new OekoboxValidationError('Unexpected logon response: missing "result" field');
  }

  return {
    username,
    email: username.includes('@') ? username : null,
    pcgifVersion: optionalString(data.pcgifversion),
    shopVersion: optionalString(data.shopversion),
  };
}

export async function endSession(transport: Transport): Promise<void> {
  await transport.get('logout', { expectJson: false });
}
