/**
 * Web App Base
 *
 * Shared HTTP plumbing for the audit and analyzer apps: lifecycle, body
 * reading, response helpers and the mapping from errors to status codes.
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { EmptyInputError, InputFormatError } from '../errors/index.js';
import type { ServerSettings } from '../config/index.js';

// ============================================================================
// Types
// ============================================================================

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

export const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

// ============================================================================
// Web App
// ============================================================================

export abstract class WebApp {
  protected host: string;
  protected port: number;
  private server: ReturnType<typeof createServer> | null = null;

  constructor(
    settings: ServerSettings,
    private readonly title: string
  ) {
    this.host = settings.host;
    this.port = settings.port;
  }

  /**
   * Start listening
   */
  async start(): Promise<void> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch(error => {
        console.error(`[${this.title}] Failed to handle request:`, error);
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        const address = server.address();
        if (address !== null && typeof address === 'object') {
          this.port = address.port;
        }
        console.log(`\n♿ ${this.title} running at ${this.url}\n`);
        resolve();
      });
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>(resolve => server.close(() => resolve()));
  }

  get url(): string {
    return `http://${this.host}:${this.port}`;
  }

  /**
   * Handle a request. Return false for an unknown route.
   */
  protected abstract route(req: IncomingMessage, res: ServerResponse, url: URL): Promise<boolean>;

  // --------------------------------------------------------------------------
  // Request Handling
  // --------------------------------------------------------------------------

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', this.url);

    try {
      const handled = await this.route(req, res, url);
      if (!handled) {
        this.send404(res);
      }
    } catch (error) {
      this.sendError(res, error);
    }
  }

  protected async readBody(req: IncomingMessage, limit: number = MAX_UPLOAD_BYTES): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size <= limit) chunks.push(chunk);
      });
      req.on('end', () => {
        if (size > limit) {
          reject(new HttpError(413, `Upload exceeds ${Math.round(limit / (1024 * 1024))} MB`));
          return;
        }
        resolve(Buffer.concat(chunks).toString('utf-8'));
      });
      req.on('error', reject);
    });
  }

  // --------------------------------------------------------------------------
  // Responses
  // --------------------------------------------------------------------------

  protected sendJson(res: ServerResponse, status: number, body: unknown): void {
    const json = JSON.stringify(body, null, 2);
    res.writeHead(status, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(json),
    });
    res.end(json);
  }

  protected sendHtml(res: ServerResponse, html: string): void {
    res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
    res.end(html);
  }

  protected sendCsv(res: ServerResponse, filename: string, csv: string): void {
    res.writeHead(200, {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': `attachment; filename="${filename}"`,
    });
    res.end(csv);
  }

  // --------------------------------------------------------------------------
  // Error Handling
  // --------------------------------------------------------------------------

  private send404(res: ServerResponse): void {
    this.sendJson(res, 404, { error: 'Not Found' });
  }

  private sendError(res: ServerResponse, error: unknown): void {
    if (error instanceof InputFormatError || error instanceof EmptyInputError) {
      this.sendJson(res, 400, { error: error.message, type: error.name });
      return;
    }
    if (error instanceof HttpError) {
      this.sendJson(res, error.status, { error: error.message });
      return;
    }

    console.error(`[${this.title}] Error:`, error);
    this.sendJson(res, 500, { error: 'Internal Server Error' });
  }
}
