import { FastifyReply, FastifyRequest } from 'fastify';
import { ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import { Participant } from '../types.js';
import { ParticipantService } from './participantService.js';

const extractApiKey = (request: FastifyRequest): string | undefined => {
  const authorization = request.headers.authorization;
  if (typeof authorization === 'string' && authorization.startsWith('Bearer ')) {
    const token = authorization.slice('Bearer '.length).trim();
    if (token) return token;
  }

  const headerKey = request.headers['x-api-key'];
  return typeof headerKey === 'string' && headerKey.trim() ? headerKey.trim() : undefined;
};

/**
 * Resolves the calling principal from its API key. Sends a 401 and returns
 * null when the key is missing or unknown.
 */
export const resolveCaller = (
  request: FastifyRequest,
  reply: FastifyReply,
  participants: ParticipantService,
): Participant | null => {
  const apiKey = extractApiKey(request);
  if (!apiKey) {
    void reply.code(401).send(toErrorEnvelope(
      ErrorCode.MissingApiKey,
      'Provide an API key via "authorization: Bearer <key>" or "x-api-key".',
    ));
    return null;
  }

  const participant = participants.findByApiKey(apiKey);
  if (!participant) {
    void reply.code(401).send(toErrorEnvelope(ErrorCode.InvalidApiKey, 'API key is not recognized.'));
    return null;
  }

  return participant;
};
