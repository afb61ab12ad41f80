import axios from 'axios';
import { PermanentDeliveryError, RecoveryError, TransientDeliveryError } from '../../types/RecoveryErrors';

/**
 * Maps an axios failure onto the delivery error taxonomy:
 * no response (timeout, network), 5xx and 429 are transient; any other status is permanent.
 */
export function toDeliveryError(error: unknown, operation: string): RecoveryError {
  if (error instanceof RecoveryError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      return new TransientDeliveryError(`${operation} failed: ${error.message}`, error.code ?? 'NETWORK_ERROR');
    }
    if (status >= 500 || status === 429) {
      return new TransientDeliveryError(`${operation} failed with HTTP ${status}`, `HTTP_${status}`);
    }
    return new PermanentDeliveryError(`${operation} rejected with HTTP ${status}`, `HTTP_${status}`);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransientDeliveryError(`${operation} failed: ${message}`);
}
