import { IncomingMessage, ServerResponse } from 'http';
import { Socket } from 'net';
import { vi } from 'vitest';
import type { App } from '../src/app';
import type { Route } from '../src/types';

export interface Dispatched {
  status: number;
  body: string;
  res: ServerResponse;
}

/** Run one request through the app's listener without opening a socket */
export async function dispatch(app: App, method: string, url: string): Promise<Dispatched> {
  const req = new IncomingMessage(new Socket());
  req.method = method;
  req.url = url;
  req.headers = { host: 'localhost' };
  const res = new ServerResponse(req);
  const end = vi.spyOn(res, 'end');

  await app.handler()(req, res);

  const chunk: unknown = end.mock.calls[0]?.[0];
  return { status: res.statusCode, body: chunk === undefined ? '' : String(chunk), res };
}

export function routeSummary(routes: readonly Route[]): string[] {
  return routes.map((r) => `${r.method} ${r.path}`);
}
