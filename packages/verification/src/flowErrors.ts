import { tagSessionErrorMessages } from '@tapconsent/tag-engine';
import {
  ChallengeErrorReasons,
  type FlowError,
  type FlowErrorReason,
} from './types';

const challengeMessages = {
  [ChallengeErrorReasons.pinIncorrect]:
    'Incorrect PIN. Please check with the sharer.',
  [ChallengeErrorReasons.pinExpired]:
    'Verification timed out. Tap again to retry.',
  [ChallengeErrorReasons.networkError]:
    'Connection error. Please check your network.',
} as const;

export const flowErrorMessages: Readonly<Record<FlowErrorReason, string>> = {
  ...tagSessionErrorMessages,
  ...challengeMessages,
};

export const flowError = (reason: FlowErrorReason): FlowError => ({
  reason,
  message: flowErrorMessages[reason],
});
