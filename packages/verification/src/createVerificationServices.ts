import type { Timestamp } from '@tapconsent/domain';
import { TagSession, type TagReaderPort } from '@tapconsent/tag-engine';
import { HttpPinDeliveryClient } from './collaborators/HttpPinDeliveryClient';
import { HttpProfileClient } from './collaborators/HttpProfileClient';
import { InMemoryProfileDirectory } from './collaborators/InMemoryProfileDirectory';
import { SimulatedPinDelivery } from './collaborators/SimulatedPinDelivery';
import type { VerificationConfig } from './config';
import { createSimulationScript } from './simulationScript';
import type { FeedbackPort, PinDeliveryPort, ProfilePort } from './types';
import { VerificationOrchestrator } from './VerificationOrchestrator';

export type VerificationServiceDeps = Readonly<{
  /** Proximity reader for live scans; without one live scans fail. */
  reader?: TagReaderPort;
  feedback?: FeedbackPort;
  fetchImpl?: typeof fetch;
  now?: () => Timestamp;
}>;

export type VerificationServices = Readonly<{
  config: VerificationConfig;
  pinDelivery: PinDeliveryPort;
  profiles: ProfilePort;
  orchestrator: VerificationOrchestrator;
  /** Present only when a reader was supplied. */
  createTagSession: (() => TagSession) | null;
}>;

/**
 * Wires the orchestrator to HTTP collaborators, or to the in-process
 * stand-ins when `config.simulate` is set.
 */
export const createVerificationServices = (
  config: VerificationConfig,
  deps: VerificationServiceDeps = {}
): VerificationServices => {
  const script = createSimulationScript({}, config.pinLength);

  let pinDelivery: PinDeliveryPort;
  let profiles: ProfilePort;
  if (config.simulate) {
    pinDelivery = new SimulatedPinDelivery({
      pin: script.pin,
      sessionTimeoutSeconds: config.sessionTimeoutSeconds,
      now: deps.now,
    });
    profiles = new InMemoryProfileDirectory([script.profile]);
  } else {
    const http = { baseUrl: config.apiBaseUrl, fetchImpl: deps.fetchImpl };
    pinDelivery = new HttpPinDeliveryClient({ ...http, now: deps.now });
    profiles = new HttpProfileClient(http);
  }

  const reader = deps.reader;
  const createTagSession = reader
    ? () => new TagSession({ reader, protocol: config.protocol })
    : null;

  const orchestrator = new VerificationOrchestrator({
    pinDelivery,
    profiles,
    createTagSession: createTagSession ?? undefined,
    feedback: deps.feedback,
    now: deps.now,
    pinLength: config.pinLength,
    allowSimulatedPin: config.allowSimulatedPin,
    simulation: script,
    simulatedSessionTimeoutSeconds: config.sessionTimeoutSeconds,
  });

  return { config, pinDelivery, profiles, orchestrator, createTagSession };
};
