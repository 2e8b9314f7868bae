export * from './types';
export * from './flowErrors';
export * from './transitions';
export * from './simulationSchedule';
export * from './simulationScript';
export * from './profileSchema';
export * from './VerificationOrchestrator';
export * from './config';
export * from './createVerificationServices';

// Errors
export * from './errors/ApplicationError';
export * from './errors/CollaboratorError';
export * from './errors/ConfigError';
export * from './errors/InvalidTransitionError';

// Collaborators
export * from './collaborators/httpJson';
export * from './collaborators/HttpPinDeliveryClient';
export * from './collaborators/HttpProfileClient';
export * from './collaborators/SimulatedPinDelivery';
export * from './collaborators/InMemoryProfileDirectory';
