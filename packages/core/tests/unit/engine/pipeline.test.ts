import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { createPipeline } from '../../../src/engine/pipeline.js';
import { Orchestrator } from '../../../src/engine/orchestrator.js';
import { silentLogger } from '../../../src/utils/logger.js';

describe('createPipeline', () => {
  it('wires an orchestrator over an in-memory session store', () => {
    const pipeline = createPipeline({
      config: DEFAULT_CONFIG,
      apiKey: 'test-secret',
      logger: silentLogger,
    });

    expect(pipeline).toBeInstanceOf(Orchestrator);
    expect(pipeline.getWorkflowStats().totalRuns).toBe(0);
    expect(pipeline.getConversationHistory('ses_new')).toEqual([]);
  });
});
