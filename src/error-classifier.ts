/**
 * Error classification for mailbox and SMTP transport failures
 * Turns raw transport errors into messages fit for a status page
 */

import { ErrorType } from './types.js';

// Re-export ErrorType for convenience
export { ErrorType };

const USER_MESSAGES: Record<ErrorType, string> = {
  [ErrorType.AUTHENTICATION]: 'Authentication failed, check the username and password',
  [ErrorType.RATE_LIMIT]: 'The server is limiting requests, try again later',
  [ErrorType.TIMEOUT]: 'The server did not respond in time',
  [ErrorType.NETWORK]: 'Could not reach the server',
  [ErrorType.SERVER_ERROR]: 'The server reported an error',
  [ErrorType.UNKNOWN]: 'Unexpected error',
};

/**
 * Error classifier - categorizes errors and phrases them for humans
 */
export class ErrorClassifier {
  /**
   * Classify error based on error message
   */
  classify(error: Error): ErrorType {
    const message = error.message.toLowerCase();

    if (this.isAuthError(message)) {
      return ErrorType.AUTHENTICATION;
    }

    if (this.isRateLimitError(message)) {
      return ErrorType.RATE_LIMIT;
    }

    // Checked before network errors: "Connection timeout" is a timeout
    if (this.isTimeoutError(message)) {
      return ErrorType.TIMEOUT;
    }

    if (this.isNetworkError(message)) {
      return ErrorType.NETWORK;
    }

    if (this.isServerError(message)) {
      return ErrorType.SERVER_ERROR;
    }

    return ErrorType.UNKNOWN;
  }

  /**
   * Get the user message for an error type
   */
  getUserMessage(errorType: ErrorType): string {
    return USER_MESSAGES[errorType];
  }

  /**
   * Describe any thrown value as "<user message> (<detail>)"
   */
  describe(error: unknown): string {
    const err = error instanceof Error ? error : new Error(String(error));
    const userMessage = this.getUserMessage(this.classify(err));
    const detail = err.message.trim();
    return detail ? `${userMessage} (${detail})` : userMessage;
  }

  private isAuthError(message: string): boolean {
    return /auth|credential|password|login|authenticationfailed/i.test(message);
  }

  private isRateLimitError(message: string): boolean {
    return /rate limit|too many|quota|bandwidth|overquota/i.test(message);
  }

  private isTimeoutError(message: string): boolean {
    return /timeout|timed out|etimedout/i.test(message);
  }

  private isNetworkError(message: string): boolean {
    return /network|connection|econnrefused|econnreset|enotfound|socket|ehostunreach/i.test(message);
  }

  private isServerError(message: string): boolean {
    return /server error|internal error|5\d\d|unavailable/i.test(message);
  }
}

const defaultClassifier = new ErrorClassifier();

/**
 * Describe a transport error with the shared classifier
 */
export function describeTransportError(error: unknown): string {
  return defaultClassifier.describe(error);
}
