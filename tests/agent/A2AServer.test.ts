import { describe, it, expect, afterEach } from 'vitest';
import { A2AServer } from '../../src/agent/A2AServer.js';
import { InMemoryTaskStore } from '../../src/stores/InMemoryTaskStore.js';
import { HttpTransport, AGENT_CARD_PATH } from '../../src/transport/HttpTransport.js';
import type { AgentCard } from '../../src/types/agent-card.js';
import type { LogLevel } from '../../src/types/plugin.js';
import { HelloWorldExecutor } from '../helpers/executors.js';
import { userMessage } from '../helpers/fixtures.js';

const CARD: AgentCard = {
  name: 'Hello Agent',
  description: '',
  url: 'http://127.0.0.1/',
  version: '0.1.0',
  capabilities: {},
  skills: [],
  defaultInputModes: ['text/plain'],
  defaultOutputModes: ['text/plain'],
};

describe('A2AServer', () => {
  const servers: A2AServer[] = [];

  afterEach(async () => {
    for (const server of servers) await server.stop();
    servers.length = 0;
  });

  it('serves the unsigned card when no signing key is given', async () => {
    const http = new HttpTransport({ host: '127.0.0.1', port: 0 });
    const server = new A2AServer({ card: CARD, executor: new HelloWorldExecutor() }).transport(http);
    servers.push(server);
    await server.start();

    const response = await fetch(`http://127.0.0.1:${http.port}${AGENT_CARD_PATH}`);
    expect(await response.json()).toEqual(CARD);
  });

  it('stores tasks in the configured store', async () => {
    const taskStore = new InMemoryTaskStore();
    const server = new A2AServer({ card: CARD, executor: new HelloWorldExecutor(), taskStore });

    const task = await server.handler.send({ message: userMessage('hi') });

    expect(taskStore.ids()).toEqual([task.kind === 'task' ? task.id : '']);
  });

  it('routes JSON-RPC through its dispatcher', async () => {
    const server = new A2AServer({ card: CARD, executor: new HelloWorldExecutor() });
    const response = await server.dispatcher.handle({ jsonrpc: '2.0', id: 1, method: 'tasks/get', params: { taskId: 'x' } });
    expect(response).toMatchObject({ id: 1, error: { message: 'Task not found: x' } });
  });

  it('passes its logger to the request handler', async () => {
    const logs: Array<[LogLevel, string]> = [];
    const server = new A2AServer({
      card: CARD,
      executor: new HelloWorldExecutor(),
      logger: (level, message) => logs.push([level, message]),
    });

    await server.handler.send({ message: userMessage('hi') });

    expect(logs).toContainEqual(['info', 'Task created']);
  });

  it('stops every transport', async () => {
    const http = new HttpTransport({ host: '127.0.0.1', port: 0 });
    const server = new A2AServer({ card: CARD, executor: new HelloWorldExecutor() }).transport(http);
    await server.start();
    expect(http.port).toBeGreaterThan(0);

    await server.stop();
    expect(http.port).toBeUndefined();
  });
});
