import { createKnowledgeStore, type KnowledgeStore, type KnowledgeStoreInput } from '@/knowledge';

/**
 * Small, hand-written knowledge base. Each call returns fresh objects since
 * building a store freezes them.
 */
export function knowledgeFixture(): KnowledgeStoreInput {
  return {
    best_practices: [
      {
        id: 'bp-1',
        title: 'Handle errors in topics',
        description: 'Add an error branch to every topic',
        category: 'topics',
        difficulty: 'beginner',
        rationale: 'Users should never see a raw stack trace',
        tags: ['error', 'topics'],
      },
      {
        id: 'bp-2',
        title: 'Store secrets safely',
        description: 'Use environment variables for secrets',
        category: 'security',
        difficulty: 'intermediate',
        rationale: 'Exported topics reveal literal values',
        example_good: 'Env.ApiKey',
        example_bad: 'ApiKey = "test-secret"',
        tags: ['security', 'secrets'],
      },
      {
        id: 'bp-3',
        title: 'Log error details',
        description: 'Capture the error code',
        category: 'topics',
        difficulty: 'advanced',
        rationale: 'Error codes speed up triage',
        tags: ['error', 'telemetry'],
      },
    ],
    snippets: [
      {
        id: 'sn-1',
        title: 'Parse JSON',
        language: 'power-fx',
        use_case: 'Read an HTTP response',
        code: 'ParseJSON(Topic.body)',
        explanation: 'Returns an untyped object',
        tags: ['json'],
      },
      {
        id: 'sn-2',
        title: 'Adaptive card',
        language: 'json',
        description: 'Card with a submit button',
        use_case: 'Collect input',
        code: '{}',
        explanation: 'Card payload',
        tags: ['card', 'json'],
      },
    ],
    troubleshooting: [
      {
        id: 'ts-1',
        title: 'HTTP 403 error',
        category: 'connectors',
        symptoms: ['Request fails with 403'],
        causes: ['Blocked by data policy'],
        steps: [
          { step: 1, action: 'Check the data policy', details: 'Open the admin center' },
          { step: 2, action: 'Retry the request' },
        ],
        tags: ['http', '403'],
      },
      {
        id: 'ts-2',
        title: 'Topic not triggering',
        category: 'topics',
        symptoms: ['Fallback answers instead'],
        causes: ['Generic trigger phrases'],
        steps: [{ step: 1, action: 'Rewrite trigger phrases' }],
        tags: ['topics'],
      },
      {
        id: 'ts-3',
        title: 'Connector timeout',
        category: 'connectors',
        symptoms: ['Request times out'],
        causes: ['Slow backend'],
        steps: [],
        tags: ['http', 'timeout'],
      },
      {
        id: 'ts-4',
        title: 'HTTP 500 from backend',
        category: 'connectors',
        tags: ['http'],
      },
    ],
    tips: [
      {
        id: 'tip-1',
        title: 'Use the test pane',
        tip: 'Open the test pane',
        why_it_matters: 'Catches bugs early',
        category: 'testing',
        tags: ['testing', 'debugging'],
      },
      {
        id: 'tip-2',
        title: 'Reuse topics',
        tip: 'Redirect to shared topics',
        category: 'topics',
        tags: ['topics', 'reuse'],
      },
      {
        id: 'tip-3',
        title: 'Topic naming',
        tip: 'Name topics by intent',
        category: 'authoring',
        tags: ['naming'],
      },
    ],
    governance: [
      {
        feature: 'http-connector',
        display_name: 'HTTP Connector',
        minimum_zone: 'Zone 2',
        zones: {
          zone1: { available: false, reason: 'Blocked by policy' },
          zone2: { available: true, requirements: ['Approval', 'Allow-list'] },
        },
        justification_template: 'Needed for {purpose}',
      },
      {
        feature: 'mcp-servers',
        display_name: 'MCP Servers',
        minimum_zone: 'Zone 3',
        zones: { zone3: { available: true } },
      },
      {
        feature: 'code-interpreter',
        display_name: 'Sandboxed Code Runner',
      },
    ],
  };
}

export function createFixtureStore(): KnowledgeStore {
  return createKnowledgeStore(knowledgeFixture());
}

/** Rendered `governance://http-connector` */
export const HTTP_CONNECTOR_GOVERNANCE = [
  '# HTTP Connector',
  '\n**Minimum zone required**: Zone 2',
  '\n**Availability by zone**:',
  '\n**ZONE1**: Not available',
  '  Reason: Blocked by policy',
  '\n**ZONE2**: Available',
  '  Requirements: Approval, Allow-list',
  '\n**Justification template**:\n> Needed for {purpose}',
].join('\n');

/** Rendered `troubleshooting://ts-1` */
export const HTTP_403_GUIDE = [
  '# HTTP 403 error',
  '\n**Symptoms**:',
  '- Request fails with 403',
  '\n**Possible causes**:',
  '- Blocked by data policy',
  '\n**Resolution steps**:',
  '\n**Step 1**: Check the data policy',
  '  Open the admin center',
  '\n**Step 2**: Retry the request',
  '  ',
].join('\n');
