import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { createEngine, errors, logs } from './helpers';

describe('Web module', () => {
    let fetchMock: Mock<typeof fetch>;

    beforeEach(() => {
        fetchMock = vi.fn<typeof fetch>(async () => new Response('hello', { status: 200 }));
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should hold the queue until the response arrives', async () => {
        const { engine, sink } = createEngine();
        engine.runCommands('~webget https://example.test/data save:req\ndebug log "<entry[req].status> <entry[req].result>"');
        expect(logs(sink)).toEqual([]);

        await engine.scheduler.whenSettled();
        expect(logs(sink)).toEqual([]);
        engine.tick();
        expect(logs(sink)).toEqual(['200 hello']);
        expect(fetchMock).toHaveBeenCalledWith('https://example.test/data', expect.objectContaining({ method: 'GET' }));
    });

    it('should not hold the queue without ~', async () => {
        const { engine, sink } = createEngine();
        const queue = engine.runCommands('webget https://example.test/data save:req\ndebug log sent');
        expect(logs(sink)).toEqual(['sent']);

        await engine.scheduler.whenSettled();
        engine.tick();
        expect(queue.getHeldScriptEntry('req')?.getObject('result')).toBe('hello');
    });

    it('should post data', async () => {
        const { engine } = createEngine();
        engine.runCommands('~webget https://example.test/submit post:payload');
        await engine.scheduler.whenSettled();
        const init = fetchMock.mock.calls[0][1];
        expect(init?.method).toBe('POST');
        expect(init?.body).toBe('payload');
    });

    it('should send headers and an explicit method', async () => {
        const { engine } = createEngine();
        engine.runCommands('~webget https://example.test/item method:put data:x headers:x-token=test-secret|accept=text/plain');
        await engine.scheduler.whenSettled();
        const init = fetchMock.mock.calls[0][1];
        expect(init?.method).toBe('PUT');
        expect(init?.headers).toEqual({ 'x-token': 'test-secret', accept: 'text/plain' });
    });

    it('should save response headers', async () => {
        fetchMock.mockImplementation(async () => new Response('{}', { status: 201, headers: { 'content-type': 'application/json' } }));
        const { engine } = createEngine();
        const queue = engine.runCommands('~webget https://example.test/new save:req');
        await engine.scheduler.whenSettled();
        engine.tick();
        const held = queue.getHeldScriptEntry('req');
        expect(held?.getObject('status')).toBe(201);
        expect(held?.getObject('failed')).toBe(false);
        expect(held?.getObject('result_headers')).toEqual({ 'content-type': 'application/json' });
        expect(held?.getObject('result_binary')).toEqual(new Uint8Array([0x7b, 0x7d]));
    });

    it('should report a failed status', async () => {
        fetchMock.mockImplementation(async () => new Response('nope', { status: 404, statusText: 'Not Found' }));
        const { engine, sink } = createEngine();
        engine.runCommands('~webget https://example.test/missing save:req\ndebug log "<entry[req].status> <entry[req].failed>"');
        await engine.scheduler.whenSettled();
        engine.tick();
        expect(errors(sink)).toEqual(["Request to 'https://example.test/missing' failed: HTTP 404 Not Found"]);
        expect(logs(sink)).toEqual(['404 true']);
    });

    it('should keep a network failure quiet with hide_failure', async () => {
        fetchMock.mockImplementation(async () => {
            throw new TypeError('fetch failed');
        });
        const { engine, sink } = createEngine();
        const queue = engine.runCommands('~webget https://example.test/down hide_failure save:req');
        await engine.scheduler.whenSettled();
        engine.tick();
        const held = queue.getHeldScriptEntry('req');
        expect(held?.getObject('status')).toBeNull();
        expect(held?.getObject('failed')).toBe(true);
        expect(errors(sink)).toEqual([]);
        expect(queue.state).toBe('finished');
    });

    it('should discard the response for a stopped queue', async () => {
        const { engine, sink } = createEngine();
        const queue = engine.runCommands('~webget https://example.test/slow save:req\ndebug log after');
        queue.stop();
        await engine.scheduler.whenSettled();
        engine.tick();
        const held = queue.getHeldScriptEntry('req');
        expect(held?.isFinished).toBe(true);
        expect(held?.hasObject('status')).toBe(false);
        expect(logs(sink)).toEqual([]);
    });

    it('should write the body to a file', async () => {
        const dir = mkdtempSync(path.join(tmpdir(), 'cuescript-web-'));
        try {
            const { engine } = createEngine({ allowFileWrite: true, dataFolder: dir });
            engine.runCommands('~webget https://example.test/page savefile:out/page.txt');
            await engine.scheduler.whenSettled();
            expect(readFileSync(path.join(dir, 'out', 'page.txt'), 'utf8')).toBe('hello');
        } finally {
            rmSync(dir, { recursive: true, force: true });
        }
    });

    it('should refuse when web requests are disabled', () => {
        const { engine, sink } = createEngine({ allowWebget: false });
        engine.runCommands('webget https://example.test');
        expect(errors(sink)).toEqual(['Web requests are disabled in the engine config (allowWebget).']);
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should reject addresses that are not http', () => {
        const { engine, sink } = createEngine();
        engine.runCommands('webget ftp://example.test\nwebget https://example.test method:fetch');
        engine.tick();
        expect(sink.messages('error').map(message => message.split('\n')[1])).toEqual([
            "Invalid URL 'ftp://example.test': must start with http:// or https://",
            "Unknown method 'FETCH', must be one of GET, POST, HEAD, OPTIONS, PUT, DELETE, PATCH"
        ]);
    });
});
