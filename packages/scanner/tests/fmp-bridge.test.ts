import { describe, it, expect } from 'vitest';
import { FmpBridge, decodeToolResult } from '../bridge/fmp-bridge.js';

describe('FmpBridge', () => {
  it('starts disconnected', () => {
    const bridge = new FmpBridge();
    expect(bridge.isConnected).toBe(false);
  });

  it('throws when calling a tool before connect', async () => {
    const bridge = new FmpBridge();
    await expect(bridge.callTool('fmp_fund_holdings', { symbol: 'QQQ' })).rejects.toThrow('FMP bridge not connected');
  });

  it('treats disconnect before connect as a no-op', async () => {
    const bridge = new FmpBridge();
    await expect(bridge.disconnect()).resolves.toBeUndefined();
    expect(bridge.isConnected).toBe(false);
  });
});

describe('decodeToolResult', () => {
  it('parses JSON text content', () => {
    const result = { content: [{ type: 'text', text: '[{"symbol":"AAPL","title":"Apple news"}]' }] };
    expect(decodeToolResult('fmp_stock_news', result)).toEqual([{ symbol: 'AAPL', title: 'Apple news' }]);
  });

  it('returns plain text that is not JSON', () => {
    const result = { content: [{ type: 'image' }, { type: 'text', text: 'no data' }] };
    expect(decodeToolResult('fmp_stock_news', result)).toBe('no data');
  });

  it('throws the error text of a failed tool call', () => {
    const result = { isError: true, content: [{ type: 'text', text: 'FMP API error 401' }] };
    expect(() => decodeToolResult('fmp_fund_holdings', result)).toThrow(
      'FMP tool fmp_fund_holdings failed: FMP API error 401',
    );
  });

  it('reports an unknown error when a failed call carries no text', () => {
    expect(() => decodeToolResult('fmp_fund_holdings', { isError: true, content: [] })).toThrow(
      'FMP tool fmp_fund_holdings failed: unknown error',
    );
  });

  it('passes through results that are not tool results', () => {
    const raw = { toolResult: 42 };
    expect(decodeToolResult('fmp_fund_holdings', raw)).toBe(raw);
    expect(decodeToolResult('fmp_fund_holdings', 'text')).toBe('text');
  });
});
