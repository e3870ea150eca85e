import * as net from 'net';
import { config } from './config';
import { createLogger } from './utils/logger';

/**
 * The subset of KV server commands the shortener relies on.
 * Implemented by KVClient; tests substitute an in-memory store.
 */
export interface KVStore {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<boolean>;
  ping(): Promise<boolean>;
}

export interface KVClientOptions {
  host: string;
  port: number;
  connectionTimeout: number;
  commandTimeout: number;
  logging: boolean;
}

interface PendingCommand {
  resolve: (response: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

const logger = createLogger('kv');

/**
 * KV TCP Client
 * Speaks the KV server's line-based protocol using Node.js net module
 */
export class KVClient implements KVStore {
  private socket: net.Socket | null = null;
  private connected: boolean = false;
  private responseBuffer: string = '';
  private pending: PendingCommand[] = [];
  private options: KVClientOptions;

  constructor(options: Partial<KVClientOptions> = {}) {
    this.options = { ...config.kv, ...options };
  }

  /**
   * Connect to the KV server
   */
  async connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      this.socket = socket;

      const timeout = setTimeout(() => {
        socket.destroy();
        reject(new Error('Connection timeout'));
      }, this.options.connectionTimeout);

      socket.connect(this.options.port, this.options.host, () => {
        this.connected = true;
        logger.debug(`Connected to ${this.options.host}:${this.options.port}`);
      });

      // Handle welcome message "+OK kv ready\n"
      socket.once('data', () => {
        clearTimeout(timeout);
        resolve();
        socket.on('data', (data) => {
          this.responseBuffer += data.toString();
          this.processBuffer();
        });
      });

      socket.on('error', (err) => {
        clearTimeout(timeout);
        this.connected = false;
        this.failPending(err);
        reject(err);
      });

      socket.on('close', () => {
        this.connected = false;
        this.failPending(new Error('Connection closed'));
        logger.debug('Connection closed');
      });
    });
  }

  /**
   * Process response buffer for line-based protocol
   */
  private processBuffer(): void {
    const lines = this.responseBuffer.split('\n');
    this.responseBuffer = lines.pop() || '';

    for (const line of lines) {
      const response = line.trim();
      const command = response ? this.pending.shift() : undefined;
      if (command) {
        clearTimeout(command.timer);
        command.resolve(response);
      }
    }
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    this.pending = [];
    for (const command of pending) {
      clearTimeout(command.timer);
      command.reject(error);
    }
  }

  /**
   * Send command and wait for response
   */
  private async sendCommand(command: string): Promise<string> {
    const socket = this.socket;
    if (!this.connected || !socket) {
      throw new Error('Not connected to KV server');
    }
    // One command per line: an embedded break would smuggle in a second one
    if (/[\r\n]/.test(command)) {
      throw new Error('Command contains a line break');
    }

    const startTime = performance.now();
    if (this.options.logging) logger.debug(`>>>> ${command}`);

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        // Responses are matched by order, so a lost reply poisons the stream
        socket.destroy();
        this.connected = false;
        this.failPending(new Error('Command timeout'));
      }, this.options.commandTimeout);

      this.pending.push({
        resolve: (response) => {
          if (this.options.logging) {
            const duration = performance.now() - startTime;
            logger.debug(`<<<< ${response} (${duration.toFixed(2)}ms)`);
          }
          resolve(response);
        },
        reject,
        timer,
      });

      socket.write(command + '\n');
    });
  }

  /**
   * SETEX key seconds value - Set with TTL
   */
  async setex(key: string, seconds: number, value: string): Promise<boolean> {
    const response = await this.sendCommand(`SETEX ${key} ${seconds} ${value}`);
    return response === '+OK';
  }

  /**
   * GET key
   */
  async get(key: string): Promise<string | null> {
    const response = await this.sendCommand(`GET ${key}`);
    if (response.startsWith('-ERR')) {
      return null;
    }
    return response;
  }

  /**
   * DELETE key
   */
  async delete(key: string): Promise<boolean> {
    const response = await this.sendCommand(`DELETE ${key}`);
    return response === '+OK';
  }

  /**
   * INCR key - Atomic increment
   */
  async incr(key: string): Promise<number> {
    const response = await this.sendCommand(`INCR ${key}`);
    const value = parseInt(response, 10);
    if (response.startsWith('-ERR') || Number.isNaN(value)) {
      throw new Error(`INCR ${key} failed: ${response}`);
    }
    return value;
  }

  /**
   * EXPIRE key seconds
   */
  async expire(key: string, seconds: number): Promise<boolean> {
    const response = await this.sendCommand(`EXPIRE ${key} ${seconds}`);
    return response === '1';
  }

  /**
   * PING - Health check
   */
  async ping(): Promise<boolean> {
    const response = await this.sendCommand('PING');
    return response === '+PONG';
  }

  /**
   * Close connection
   */
  async close(): Promise<void> {
    const socket = this.socket;
    if (socket && this.connected) {
      try {
        await this.sendCommand('QUIT');
      } catch (error) {
        logger.debug('QUIT failed, closing anyway', { error });
      }
      socket.destroy();
      this.socket = null;
      this.connected = false;
    }
  }

  /**
   * Check connection status
   */
  isConnected(): boolean {
    return this.connected;
  }
}

// Singleton instance
let clientInstance: KVClient | null = null;
let connecting: Promise<KVClient> | null = null;

export async function getKVClient(): Promise<KVClient> {
  if (clientInstance && clientInstance.isConnected()) {
    return clientInstance;
  }
  // Concurrent callers share one connection attempt
  if (!connecting) {
    const client = new KVClient();
    connecting = client
      .connect()
      .then(() => {
        clientInstance = client;
        return client;
      })
      .finally(() => {
        connecting = null;
      });
  }
  return connecting;
}

export async function closeKVClient(): Promise<void> {
  if (clientInstance) {
    await clientInstance.close();
    clientInstance = null;
  }
}
