import { CallEventRequest } from './schemas';
import { CallEventInput } from '../utils/calls';

export type CallEventValidation =
  | { valid: true; input: CallEventInput }
  | { valid: false; reason: string };

/**
 * Validate a call event beyond schema validation.
 * Both fields must be present and non-blank; string values come back trimmed.
 */
export function validateCallEvent(body: CallEventRequest | undefined): CallEventValidation {
  const callerId = body?.caller_id?.trim() ?? '';
  const zip = typeof body?.zip_code === 'string' ? body.zip_code.trim() : body?.zip_code;

  if (!callerId || zip === undefined || zip === '') {
    return {
      valid: false,
      reason: 'Missing caller_id or zip_code',
    };
  }

  return {
    valid: true,
    input: { caller_id: callerId, zip_code: zip },
  };
}
