import { v4 as uuid } from 'uuid';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { Participant } from '../types.js';
import { isoNow } from '../utils/time.js';

export interface RegisterParticipantInput {
  name: string;
}

/** Issues principals and the API keys that prove them. */
export class ParticipantService {
  constructor(
    private readonly store: StateStore,
    private readonly logger: EventLogger,
  ) {}

  async register(input: RegisterParticipantInput): Promise<Participant> {
    const participant: Participant = {
      principal: uuid(),
      name: input.name,
      apiKey: `gk_${uuid().replace(/-/g, '')}`,
      createdAt: isoNow(),
    };

    await this.store.transaction((state) => {
      state.participants[participant.principal] = participant;
      state.metrics.participantsRegistered += 1;
    });

    eventBus.emit('participant.registered', { principal: participant.principal, name: participant.name });
    await this.logger.log('info', 'participant.registered', { principal: participant.principal });

    return participant;
  }

  getByPrincipal(principal: string): Participant | null {
    return this.store.read((state) => state.participants[principal] ?? null);
  }

  findByApiKey(apiKey: string): Participant | null {
    return this.store.read((state) => (
      Object.values(state.participants).find((participant) => participant.apiKey === apiKey) ?? null
    ));
  }
}
