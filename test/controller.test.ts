import { describe, it } from 'node:test';
import assert from 'node:assert';
import { PaperSourceAdapter } from '../src/ingestion/paperSource.js';
import { ConversationDriver, looksLikeReport } from '../src/orchestrator/controller.js';
import { ToolDispatcher } from '../src/orchestrator/dispatcher.js';
import { CODE_EXECUTION, ToolRegistry, createSearchAndFilterTool } from '../src/orchestrator/tools/index.js';
import { AgentTransportError } from '../src/utils/errors.js';
import { silentLogger } from '../src/utils/logger.js';
import { FakePaperSearch, ScriptedAgent, agentResponse, answer, clock, paper, toolCall } from './helpers.js';

function driverFor(agent: ScriptedAgent) {
  const search = new FakePaperSearch({
    2024: [paper('Agent swarms', ''), paper('Kernel methods', '')],
    2025: [paper('LLM agents', '', 2025)],
  });
  const registry = new ToolRegistry().registerRemote(CODE_EXECUTION).registerLocal(
    createSearchAndFilterTool(new PaperSourceAdapter(search, silentLogger, clock), {
      categories: ['cs.AI'],
      keywords: ['agent'],
      defaultMaxResults: 10,
    }),
  );
  return { search, driver: new ConversationDriver(agent, registry, new ToolDispatcher(registry, silentLogger), silentLogger) };
}

const options = { instruction: 'Analyse 2024-2025.', maxTurns: 5, maxTokens: 1000 };

describe('ConversationDriver', () => {
  it('should return null without any request when max_turns is 0', async () => {
    const agent = new ScriptedAgent([]);
    const { driver, search } = driverFor(agent);

    const outcome = await driver.run({ ...options, maxTurns: 0 });

    assert.deepStrictEqual(outcome, { markdown: null, termination: 'turn_limit', turns: 0 });
    assert.strictEqual(agent.requests.length, 0);
    assert.strictEqual(search.queries.length, 0);
  });

  it('should send every tool result back before the next request', async () => {
    const agent = new ScriptedAgent([
      () =>
        agentResponse('tool_requested', [
          answer('Fetching both years.'),
          toolCall('toolu_a', 'search_and_filter_papers', { year: 2024 }),
          toolCall('toolu_b', 'search_and_filter_papers', { year: 2025 }),
        ]),
      () => agentResponse('completed', [answer('# arXiv Trend Report\n\nDone.')]),
    ]);
    const { driver } = driverFor(agent);

    const outcome = await driver.run(options);

    assert.deepStrictEqual(outcome, { markdown: '# arXiv Trend Report\n\nDone.', termination: 'completed', turns: 2 });
    assert.strictEqual(agent.requests.length, 2);

    const first = agent.requests[0];
    assert.deepStrictEqual(first?.messages, [{ role: 'user', content: 'Analyse 2024-2025.' }]);
    assert.deepStrictEqual(
      first?.tools.map((t) => (t.kind === 'local' ? t.name : t.capability.name)),
      ['code_execution', 'search_and_filter_papers'],
    );
    assert.strictEqual(first?.maxTokens, 1000);

    const second = agent.requests[1];
    assert.strictEqual(second?.messages.length, 3);
    assert.strictEqual(second?.messages[1]?.role, 'assistant');
    assert.deepStrictEqual(second?.messages[2], {
      role: 'user',
      content: [
        {
          type: 'tool_result',
          tool_use_id: 'toolu_a',
          content: '{"year":2024,"total_papers":2,"agent_papers":1,"search_error":null}',
          is_error: false,
        },
        {
          type: 'tool_result',
          tool_use_id: 'toolu_b',
          content: '{"year":2025,"total_papers":1,"agent_papers":1,"search_error":null}',
          is_error: false,
        },
      ],
    });
  });

  it('should feed an unsupported tool back as an error and keep going', async () => {
    const agent = new ScriptedAgent([
      () => agentResponse('tool_requested', [toolCall('toolu_x', 'download_paper', { id: '2401.00001' })]),
      () => agentResponse('completed', [answer('Recovered.')]),
    ]);
    const { driver } = driverFor(agent);

    const outcome = await driver.run(options);

    assert.strictEqual(outcome.markdown, 'Recovered.');
    assert.deepStrictEqual(agent.requests[1]?.messages[2], {
      role: 'user',
      content: [{ type: 'tool_result', tool_use_id: 'toolu_x', content: 'Unsupported tool: download_paper', is_error: true }],
    });
  });

  it('should give up with null once max_turns is exhausted', async () => {
    const agent = new ScriptedAgent([
      () => agentResponse('tool_requested', [toolCall('toolu_1', 'search_and_filter_papers', { year: 2024 })]),
      () => agentResponse('tool_requested', [toolCall('toolu_2', 'search_and_filter_papers', { year: 2025 })]),
      () => agentResponse('completed', [answer('too late')]),
    ]);
    const { driver } = driverFor(agent);

    const outcome = await driver.run({ ...options, maxTurns: 2 });

    assert.deepStrictEqual(outcome, { markdown: null, termination: 'turn_limit', turns: 2 });
    assert.strictEqual(agent.requests.length, 2);
  });

  it('should keep partial text when the token ceiling is hit', async () => {
    const agent = new ScriptedAgent([() => agentResponse('token_limit_reached', [answer('# arXiv Trend Report\n\n## 2024')])]);
    const { driver } = driverFor(agent);

    assert.deepStrictEqual(await driver.run(options), {
      markdown: '# arXiv Trend Report\n\n## 2024',
      termination: 'token_limit',
      turns: 1,
    });
  });

  it('should return null at the token ceiling when nothing was written', async () => {
    const agent = new ScriptedAgent([() => agentResponse('token_limit_reached', [])]);
    const { driver } = driverFor(agent);

    const outcome = await driver.run(options);
    assert.strictEqual(outcome.markdown, null);
    assert.strictEqual(outcome.termination, 'token_limit');
  });

  it('should continue a paused server tool and fall back to its output', async () => {
    const agent = new ScriptedAgent([
      () =>
        agentResponse('capability_requested', [
          {
            kind: 'remote_capability_invocation',
            callId: 'srvtoolu_1',
            name: 'bash_code_execution',
            input: { command: 'python chart.py' },
            output: '2024 : ████ 1 papers (50.00%)',
          },
        ]),
      () => agentResponse('completed', []),
    ]);
    const { driver } = driverFor(agent);

    const outcome = await driver.run(options);

    assert.strictEqual(outcome.markdown, '```text\n2024 : ████ 1 papers (50.00%)\n```');
    // the paused assistant turn goes back without a tool result turn
    assert.strictEqual(agent.requests[1]?.messages.length, 2);
    assert.strictEqual(agent.requests[1]?.messages[1]?.role, 'assistant');
  });

  it('should not mistake narration from a tool turn for the report', async () => {
    const agent = new ScriptedAgent([
      () =>
        agentResponse('tool_requested', [
          answer("I'll search 2024 first."),
          toolCall('toolu_1', 'search_and_filter_papers', { year: 2024 }),
        ]),
      () => agentResponse('completed', []),
    ]);
    const { driver } = driverFor(agent);

    assert.deepStrictEqual(await driver.run(options), { markdown: null, termination: 'completed', turns: 2 });
  });

  it('should fall back to an earlier report written before a tool call', async () => {
    const agent = new ScriptedAgent([
      () =>
        agentResponse('tool_requested', [
          answer('# arXiv Trend Report\n\n## 2024'),
          toolCall('toolu_1', 'search_and_filter_papers', { year: 2024 }),
        ]),
      () => agentResponse('completed', [answer('  ')]),
    ]);
    const { driver } = driverFor(agent);

    assert.strictEqual((await driver.run(options)).markdown, '# arXiv Trend Report\n\n## 2024');
  });

  it('should let a transport error abort the run', async () => {
    const agent = new ScriptedAgent([
      () => agentResponse('tool_requested', [toolCall('toolu_1', 'search_and_filter_papers', { year: 2024 })]),
      () => {
        throw new AgentTransportError('Reasoning agent request failed (http): 529 overloaded', 529);
      },
    ]);
    const { driver } = driverFor(agent);

    await assert.rejects(driver.run(options), (err: unknown) => err instanceof AgentTransportError && err.status === 529);
  });
});

describe('looksLikeReport', () => {
  it('should accept headings and fenced blocks only', () => {
    assert.strictEqual(looksLikeReport('## 2024\n\n- Total papers: 5'), true);
    assert.strictEqual(looksLikeReport('Chart:\n```text\n2024 : █ 1 papers\n```'), true);
    assert.strictEqual(looksLikeReport("Now I'll fetch 2025."), false);
    assert.strictEqual(looksLikeReport('#hashtag without a space'), false);
  });
});
