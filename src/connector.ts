// IMAP Connector - Manages the connection to the monitored mailbox
import { ImapFlow } from 'imapflow';
import type { MailboxSettings } from './types.js';

/**
 * Error thrown when IMAP authentication fails
 */
export class AuthenticationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/**
 * Error thrown when IMAP connection fails
 */
export class ConnectionError extends Error {
  public readonly retryGuidance: string;

  constructor(message: string, retryGuidance?: string) {
    super(message);
    this.name = 'ConnectionError';
    this.retryGuidance = retryGuidance || 'Please check your network connection and try again.';
  }
}

/**
 * IMAP server configuration
 */
export interface IMAPConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  /** Whether to use TLS/SSL encryption */
  tls: boolean;
}

/**
 * Result of a connection attempt
 */
export interface ConnectionResult {
  success: boolean;
  error?: string;
  connection?: ImapFlow;
}

/**
 * Connection options for retry and timeout
 */
export interface ConnectionOptions {
  maxRetries?: number;
  retryDelay?: number;
  /** Greeting, socket and connect timeout in milliseconds */
  connectionTimeout?: number;
}

const DEFAULT_CONNECTION_OPTIONS: Required<ConnectionOptions> = {
  maxRetries: 2,
  retryDelay: 2000,
  connectionTimeout: 10000,
};

/** Mailbox scanned for notifications */
export const MONITORED_MAILBOX = 'INBOX';

/**
 * What the scanner needs from a mailbox. Implemented over IMAP by
 * ImapMailboxTransport; tests provide an in-process fake.
 */
export interface MailboxTransport {
  /** Connect, authenticate and open the mailbox read-only. Throws on failure. */
  open(): Promise<void>;
  /** UIDs of messages received on or after the given day */
  searchSince(date: Date): Promise<number[]>;
  /** Full RFC 822 source of a message, null when the server returned none */
  fetchSource(uid: number): Promise<Buffer | null>;
  /** False once the underlying connection has dropped */
  isUsable(): boolean;
  /** Safe to call even if not connected */
  close(): Promise<void>;
}

/**
 * Settings-to-config conversion; callers check completeness first.
 */
export function toIMAPConfig(settings: MailboxSettings): IMAPConfig {
  return {
    host: settings.imapHost ?? '',
    port: settings.imapPort,
    username: settings.imapUsername ?? '',
    password: settings.imapPassword ?? '',
    tls: settings.imapUseTls,
  };
}

/**
 * Race a promise against a timer. The timer is cleared either way.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(message)), ms);
  });
  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * IMAPConnector manages the connection to the IMAP server.
 * Handles authentication, connection lifecycle and health tracking.
 */
export class IMAPConnector {
  private client: ImapFlow | null = null;
  private options: Required<ConnectionOptions>;
  private connectionHealthy: boolean = false;

  constructor(options?: ConnectionOptions) {
    this.options = { ...DEFAULT_CONNECTION_OPTIONS, ...options };
  }

  /**
   * Connect to the IMAP server with retry logic.
   * Authentication failures are not retried.
   *
   * @param config - IMAP configuration with credentials
   * @returns ConnectionResult with success status and connection or error
   */
  async connect(config: IMAPConfig): Promise<ConnectionResult> {
    let lastError: string = '';

    for (let attempt = 1; attempt <= this.options.maxRetries; attempt++) {
      try {
        const result = await this.attemptConnect(config, attempt);
        if (result.success) {
          this.connectionHealthy = true;
          return result;
        }
        lastError = result.error || 'Unknown error';

        if (lastError.startsWith('Authentication failed')) {
          return result;
        }
      } catch (error) {
        lastError = error instanceof Error ? error.message : 'Unknown error';
      }

      // Wait before retry (except on last attempt)
      if (attempt < this.options.maxRetries) {
        console.log(`[IMAPConnector] Connection attempt ${attempt} failed, retrying in ${this.options.retryDelay}ms...`);
        await this.delay(this.options.retryDelay);
      }
    }

    return {
      success: false,
      error: `Connection failed after ${this.options.maxRetries} attempts: ${lastError}`,
    };
  }

  /**
   * Single connection attempt with timeout
   */
  private async attemptConnect(config: IMAPConfig, attempt: number): Promise<ConnectionResult> {
    // Clean up any existing connection
    await this.disconnect();

    const client = new ImapFlow({
      host: config.host,
      port: config.port,
      secure: config.tls,
      auth: {
        user: config.username,
        pass: config.password,
      },
      logger: false,
      emitLogs: false,
      greetingTimeout: this.options.connectionTimeout,
      socketTimeout: this.options.connectionTimeout,
    });
    this.client = client;

    client.on('error', (err: Error) => {
      console.error(`[IMAPConnector] Connection error: ${err.message}`);
      this.connectionHealthy = false;
    });

    client.on('close', () => {
      console.log('[IMAPConnector] Connection closed');
      this.connectionHealthy = false;
    });

    try {
      await withTimeout(client.connect(), this.options.connectionTimeout, 'Connection timeout');

      console.log(`[IMAPConnector] Connected to ${config.host}:${config.port} on attempt ${attempt}`);
      return {
        success: true,
        connection: client,
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.client = null;
      client.close();

      if (this.isAuthenticationError(errorMessage)) {
        const authError = new AuthenticationError(
          `Authentication failed: ${errorMessage}`
        );
        return {
          success: false,
          error: authError.message,
        };
      }

      const connError = new ConnectionError(
        `Connection failed: ${errorMessage}`,
        `Verify that ${config.host}:${config.port} is reachable and that the TLS setting matches the server.`
      );
      return {
        success: false,
        error: `${connError.message}. ${connError.retryGuidance}`,
      };
    }
  }

  /**
   * Disconnect from the IMAP server.
   * Safe to call even if not connected.
   */
  async disconnect(): Promise<void> {
    this.connectionHealthy = false;
    const client = this.client;
    this.client = null;
    if (client) {
      try {
        await client.logout();
      } catch (error) {
        console.warn('[IMAPConnector] Logout failed:', error instanceof Error ? error.message : 'Unknown');
        client.close();
      }
    }
  }

  /**
   * Get the current IMAP connection.
   *
   * @returns The ImapFlow client or null if not connected
   */
  getConnection(): ImapFlow | null {
    return this.client;
  }

  /**
   * Check if currently connected.
   */
  isConnected(): boolean {
    return this.client !== null && this.connectionHealthy;
  }

  /**
   * Determine if an error message indicates an authentication failure.
   */
  private isAuthenticationError(message: string): boolean {
    const authErrorPatterns = [
      'authentication failed',
      'invalid credentials',
      'login failed',
      'AUTHENTICATIONFAILED',
      'invalid password',
      'incorrect password',
    ];

    const lowerMessage = message.toLowerCase();
    return authErrorPatterns.some(pattern => lowerMessage.includes(pattern.toLowerCase()));
  }

  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

/**
 * MailboxTransport over IMAP, backed by IMAPConnector.
 */
export class ImapMailboxTransport implements MailboxTransport {
  private readonly connector: IMAPConnector;

  constructor(private readonly config: IMAPConfig, options?: ConnectionOptions) {
    this.connector = new IMAPConnector(options);
  }

  async open(): Promise<void> {
    const result = await this.connector.connect(this.config);
    if (!result.success) {
      throw new ConnectionError(result.error || 'Connection failed');
    }
    await this.requireClient().mailboxOpen(MONITORED_MAILBOX, { readOnly: true });
  }

  async searchSince(date: Date): Promise<number[]> {
    const uids = await this.requireClient().search({ since: date }, { uid: true });
    if (!uids) {
      return [];
    }
    return uids;
  }

  async fetchSource(uid: number): Promise<Buffer | null> {
    const message = await this.requireClient().fetchOne(String(uid), { source: true }, { uid: true });
    if (!message || !message.source) {
      return null;
    }
    return message.source;
  }

  isUsable(): boolean {
    return this.connector.isConnected();
  }

  async close(): Promise<void> {
    await this.connector.disconnect();
  }

  private requireClient(): ImapFlow {
    const client = this.connector.getConnection();
    if (!client) {
      throw new ConnectionError('Not connected. Call open() first.');
    }
    return client;
  }
}
