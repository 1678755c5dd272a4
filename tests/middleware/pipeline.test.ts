import { describe, it, expect } from 'vitest';
import { pipeline } from '../../src/middleware/pipeline.js';
import type { Handler, HandlerContext, Middleware } from '../../src/middleware/pipeline.js';

describe('pipeline', () => {
  const ctx: HandlerContext = { requestId: 'req-1' };

  it('calls the handler directly without middleware', async () => {
    const handler: Handler = async () => new Response('ok', { status: 200 });

    const res = await pipeline()(handler)(new Request('http://test'), ctx);

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('ok');
  });

  it('applies middleware left to right', async () => {
    const order: string[] = [];
    const tag =
      (name: string): Middleware =>
      (next) =>
      async (req, c) => {
        order.push(`${name}-before`);
        const res = await next(req, c);
        order.push(`${name}-after`);
        return res;
      };
    const handler: Handler = async () => {
      order.push('handler');
      return new Response('ok');
    };

    await pipeline(tag('outer'), tag('inner'))(handler)(new Request('http://test'), ctx);

    expect(order).toEqual(['outer-before', 'inner-before', 'handler', 'inner-after', 'outer-after']);
  });

  it('lets middleware short-circuit', async () => {
    const blocker: Middleware = () => async () => new Response('blocked', { status: 403 });
    const handler: Handler = async () => {
      throw new Error('Should not reach handler');
    };

    const res = await pipeline(blocker)(handler)(new Request('http://test'), ctx);

    expect(res.status).toBe(403);
  });

  it('passes an extended context downstream', async () => {
    const withBody: Middleware = (next) => (req, c) => next(req, { ...c, body: { question: 'hi' } });
    const handler: Handler = async (_req, c) =>
      new Response(`${c.requestId}:${String(c.body?.question)}`);

    const res = await pipeline(withBody)(handler)(new Request('http://test'), ctx);

    expect(await res.text()).toBe('req-1:hi');
  });
});
