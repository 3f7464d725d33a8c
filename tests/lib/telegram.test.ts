import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import http from 'node:http';
import { TelegramNotifier, notifySafely } from '@/lib/telegram.js';
import { createCapturingLogger, messageOf, RecordingNotifier } from '../helpers/mocks.js';

interface ReceivedMessage {
  path: string;
  body: unknown;
}

describe('TelegramNotifier', () => {
  let server: http.Server;
  let baseUrl: string;
  let received: ReceivedMessage[];
  let reply: { status: number; body: unknown };

  beforeEach(async () => {
    received = [];
    reply = { status: 200, body: { ok: true, result: { message_id: 1 } } };
    server = http.createServer((req, res) => {
      let data = '';
      req.on('data', (chunk: Buffer) => {
        data += chunk.toString();
      });
      req.on('end', () => {
        received.push({ path: req.url ?? '', body: JSON.parse(data) });
        res.writeHead(reply.status, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(reply.body));
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Failed to get server address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('posts the message to the chat', async () => {
    const notifier = new TelegramNotifier({ botToken: 'test-token', chatId: '42', apiBaseUrl: baseUrl });

    await notifier.notify('Processing 3 clips from 2024-05-01');

    expect(received).toEqual([
      { path: '/bottest-token/sendMessage', body: { chat_id: '42', text: 'Processing 3 clips from 2024-05-01' } },
    ]);
  });

  it('throws when the Bot API reports a failure', async () => {
    reply = { status: 200, body: { ok: false, description: 'Bad Request: chat not found' } };
    const notifier = new TelegramNotifier({ botToken: 'test-token', chatId: '42', apiBaseUrl: baseUrl });

    await expect(notifier.notify('hello')).rejects.toThrow('Telegram rejected the message: Bad Request: chat not found');
  });
});

describe('notifySafely', () => {
  it('logs a failed notification as a warning instead of throwing', async () => {
    const notifier = new RecordingNotifier();
    notifier.fail = true;
    const { logger, lines } = createCapturingLogger();

    await expect(notifySafely(notifier, 'hello', logger)).resolves.toBeUndefined();

    expect((await lines()).map(messageOf)).toEqual(['Failed to send notification: chat unreachable']);
  });
});
