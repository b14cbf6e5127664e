// FMP MCP Bridge — connects the scanner to the fmp-mcp-server for live market data

import { fileURLToPath } from 'node:url';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { z } from 'zod';

export interface FmpBridgeConfig {
  /** Path to the FMP MCP server entry point (default: the compiled fmp-mcp-server beside this package) */
  serverPath?: string;
  /** Command to launch the server (default: 'node') */
  command?: string;
  /** Extra environment for the server process, e.g. FMP_API_KEY */
  env?: Record<string, string>;
}

export type FmpToolCaller = (
  toolName: string,
  params: Record<string, unknown>,
  options?: { signal?: AbortSignal },
) => Promise<unknown>;

const ToolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).default([]),
  isError: z.boolean().optional(),
});

export function defaultServerPath(): string {
  return fileURLToPath(new URL('../../fmp-mcp-server/src/index.js', import.meta.url));
}

/** Extract the tool payload: parsed JSON when the text is JSON, else the raw text. */
export function decodeToolResult(toolName: string, result: unknown): unknown {
  const parsed = ToolResultSchema.safeParse(result);
  if (!parsed.success) return result;

  const text = parsed.data.content.find((c) => c.type === 'text')?.text;
  if (parsed.data.isError) {
    throw new Error(`FMP tool ${toolName} failed: ${text ?? 'unknown error'}`);
  }
  if (text === undefined) return result;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class FmpBridge {
  private client: Client;
  private transport: StdioClientTransport | null = null;
  private connected = false;

  constructor() {
    this.client = new Client(
      { name: 'fund-scanner-fmp', version: '0.1.0' },
      { capabilities: {} },
    );
  }

  async connect(config: FmpBridgeConfig = {}): Promise<void> {
    if (this.connected) return;

    const serverPath = config.serverPath ?? defaultServerPath();
    const command = config.command ?? 'node';

    this.transport = new StdioClientTransport({
      command,
      args: [serverPath],
      env: config.env ? { ...getDefaultEnvironment(), ...config.env } : undefined,
    });

    await this.client.connect(this.transport);
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    await this.client.close();
    this.connected = false;
  }

  /** Call an FMP tool by name */
  async callTool(
    toolName: string,
    params: Record<string, unknown>,
    options: { signal?: AbortSignal } = {},
  ): Promise<unknown> {
    if (!this.connected) throw new Error('FMP bridge not connected');

    const result = await this.client.callTool({ name: toolName, arguments: params }, undefined, {
      signal: options.signal,
    });
    return decodeToolResult(toolName, result);
  }

  get isConnected(): boolean {
    return this.connected;
  }
}

/**
 * Create a callFmpTool function for the live providers.
 */
export async function createFmpToolCaller(config?: FmpBridgeConfig): Promise<{
  callFmpTool: FmpToolCaller;
  bridge: FmpBridge;
}> {
  const bridge = new FmpBridge();
  await bridge.connect(config);
  return {
    callFmpTool: (name, params, options) => bridge.callTool(name, params, options),
    bridge,
  };
}
