// packages/core/src/stages/persona-filter.ts

import type { PersonaEngine } from '../persona/persona-engine.js';
import { advanceStage, getPersonaState, setPersonaState } from '../state/workflow-state.js';
import type { WorkflowState } from '../types/workflow.js';
import type { Logger } from '../utils/logger.js';
import type { Rng } from '../utils/random.js';
import { Stage } from './stage.js';

export class PersonaFilterStage extends Stage {
  readonly name = 'persona_filter' as const;

  constructor(
    logger: Logger,
    private readonly engine: PersonaEngine,
    private readonly rng: Rng,
  ) {
    super(logger);
  }

  protected run(state: WorkflowState): void {
    const persona = getPersonaState(state);
    const text = state.normalizedInput ?? state.rawInput;

    const change = this.engine.updateMood(persona, text, this.rng);
    if (change) {
      this.logger.debug(`Mood shifted to ${change.mood} for ${state.sessionId}`);
    }
    persona.context.conversationTurns += 1;
    persona.context.lastTopic = state.classification?.category ?? null;

    state.personaResponse = this.engine.respond(text, persona);
    setPersonaState(state, persona);
    advanceStage(state, 'persona_applied');
  }
}
