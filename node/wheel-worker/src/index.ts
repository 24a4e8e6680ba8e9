import readline from 'node:readline';
import { handleAsync, toErrorBody, type RpcErrorBody } from './rpc.js';

type RpcId = string | number | null;

type RpcRequest = {
  jsonrpc?: string;
  method: string;
  params?: unknown;
  id?: RpcId;
};

type RpcResponse = {
  jsonrpc: '2.0';
  result?: unknown;
  error?: RpcErrorBody;
  id?: RpcId;
};

function respond(resp: Omit<RpcResponse, 'jsonrpc'>) {
  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ jsonrpc: '2.0', ...resp }));
}

function isRequest(value: unknown): value is RpcRequest {
  return typeof value === 'object' && value !== null && 'method' in value && typeof value.method === 'string';
}

async function handleLine(line: string) {
  const trimmed = line.trim();
  if (!trimmed) return;
  let req: unknown;
  try {
    req = JSON.parse(trimmed);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    respond({ error: { code: -32700, message: `parse error: ${msg}` } });
    return;
  }
  if (!isRequest(req)) {
    respond({ error: { code: -32600, message: 'invalid request' } });
    return;
  }
  try {
    const result = await handleAsync(req.method, req.params);
    respond({ result, id: req.id });
  } catch (e: unknown) {
    respond({ error: toErrorBody(e), id: req.id });
  }
}

function main() {
  const rl = readline.createInterface({ input: process.stdin });
  rl.on('line', (line: string) => {
    void handleLine(line);
  });
}

main();
