/**
 * Unverified token inspection
 *
 * Decodes header and claims WITHOUT checking the signature. For diagnostics
 * only; never trust the result.
 */

import * as jose from 'jose';
import { fail, ok, type Result } from '../types/result';

export interface InspectedToken {
  header: jose.ProtectedHeaderParameters;
  payload: jose.JWTPayload;
  /** Length of the signature segment, 0 for unsecured tokens */
  signatureLength: number;
}

export function inspectToken(token: string): Result<InspectedToken, string> {
  try {
    const header = jose.decodeProtectedHeader(token);
    const payload = jose.decodeJwt(token);
    const signature = token.split('.')[2] ?? '';
    return ok({ header, payload, signatureLength: signature.length });
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return fail(`Failed to decode token: ${message}`);
  }
}
