/**
 * Firecracker API client - HTTP over the control-plane unix socket
 *
 * Requests are announced through the CommandRunner so they show up in the
 * verbose/dry-run trace; in dry-run nothing is sent.
 */

import * as http from 'http';
import { z } from 'zod';
import type { CommandRunner } from './command-runner.js';
import type {
  InstanceInfo,
  SnapshotCreateParams,
  SnapshotLoadParams,
  VmStateRequest,
} from '../types/firecracker.js';

/** Control-plane operations the sandbox relies on */
export interface VmControlPlane {
  setVmState(socketPath: string, state: VmStateRequest): Promise<void>;
  createSnapshot(socketPath: string, params: SnapshotCreateParams): Promise<void>;
  loadSnapshot(socketPath: string, params: SnapshotLoadParams): Promise<void>;
  waitUntilReady(socketPath: string, timeoutMs: number, intervalMs: number): Promise<void>;
}

export class FirecrackerApiError extends Error {
  constructor(
    readonly method: string,
    readonly endpoint: string,
    readonly statusCode: number,
    readonly faultMessage: string
  ) {
    super(`API request failed: ${method} ${endpoint} -> ${statusCode}${faultMessage ? ` - ${faultMessage}` : ''}`);
    this.name = 'FirecrackerApiError';
  }
}

const FaultSchema = z.object({ fault_message: z.string() });

const InstanceInfoSchema = z.object({
  id: z.string(),
  state: z.enum(['Not started', 'Running', 'Paused']),
  vmm_version: z.string(),
  app_name: z.string(),
});

export class FirecrackerApiClient implements VmControlPlane {
  private runner: CommandRunner;
  private timeoutMs: number;

  constructor(runner: CommandRunner, timeoutMs = 10000) {
    this.runner = runner;
    this.timeoutMs = timeoutMs;
  }

  /**
   * PATCH /vm - pause or resume the guest
   */
  async setVmState(socketPath: string, state: VmStateRequest): Promise<void> {
    await this.send(socketPath, 'PATCH', '/vm', { state });
  }

  /**
   * PUT /snapshot/create
   */
  async createSnapshot(socketPath: string, params: SnapshotCreateParams): Promise<void> {
    await this.send(socketPath, 'PUT', '/snapshot/create', params);
  }

  /**
   * PUT /snapshot/load
   */
  async loadSnapshot(socketPath: string, params: SnapshotLoadParams): Promise<void> {
    await this.send(socketPath, 'PUT', '/snapshot/load', params);
  }

  /**
   * GET / - instance information
   */
  async describeInstance(socketPath: string): Promise<InstanceInfo | null> {
    const body = await this.send(socketPath, 'GET', '/');
    const parsed = InstanceInfoSchema.safeParse(body);
    return parsed.success ? parsed.data : null;
  }

  /**
   * Poll GET / until the API answers
   */
  async waitUntilReady(socketPath: string, timeoutMs: number, intervalMs: number): Promise<void> {
    if (!this.runner.trace(`wait for API on ${socketPath}`)) return;

    const deadline = Date.now() + timeoutMs;
    let lastError: unknown = null;

    do {
      try {
        await this.request(socketPath, 'GET', '/');
        return;
      } catch (error) {
        lastError = error;
      }
      await new Promise((resolve) => setTimeout(resolve, intervalMs));
    } while (Date.now() < deadline);

    throw new Error(
      `Timeout waiting for API socket ${socketPath}: ${lastError instanceof Error ? lastError.message : String(lastError)}`
    );
  }

  /**
   * Send one request, announced through the runner trace
   */
  async send(socketPath: string, method: string, endpoint: string, body?: unknown): Promise<unknown> {
    const payload = body === undefined ? '' : ` ${JSON.stringify(body)}`;
    if (!this.runner.trace(`${method} ${endpoint}${payload} (via ${socketPath})`)) {
      return null;
    }
    return this.request(socketPath, method, endpoint, body);
  }

  private request(socketPath: string, method: string, endpoint: string, body?: unknown): Promise<unknown> {
    return new Promise((resolve, reject) => {
      const bodyStr = body === undefined ? '' : JSON.stringify(body);

      const req = http.request(
        {
          socketPath,
          method,
          path: endpoint,
          headers: {
            Accept: 'application/json',
            'Content-Type': 'application/json',
            'Content-Length': Buffer.byteLength(bodyStr),
          },
          timeout: this.timeoutMs,
        },
        (res) => {
          let respBody = '';
          res.setEncoding('utf-8');
          res.on('data', (chunk: string) => {
            respBody += chunk;
          });
          res.on('end', () => {
            const statusCode = res.statusCode ?? 0;
            const parsed = parseJson(respBody);

            if (statusCode >= 200 && statusCode < 300) {
              resolve(parsed);
              return;
            }

            const fault = FaultSchema.safeParse(parsed);
            reject(
              new FirecrackerApiError(method, endpoint, statusCode, fault.success ? fault.data.fault_message : respBody)
            );
          });
        }
      );

      req.on('timeout', () => {
        req.destroy(new Error(`API request timeout: ${method} ${endpoint}`));
      });

      req.on('error', (err) => {
        reject(err);
      });

      req.end(bodyStr);
    });
  }
}

function parseJson(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
