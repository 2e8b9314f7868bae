// Shared
export * from './shared/Assert';
export * from './shared/CancellationToken';
export * from './shared/Unsubscribe';
export * from './shared/vos/ValueObject';
export * from './shared/vos/Timestamp';

// Identity
export * from './identity/MemberId';

// Verification
export * from './verification/PinEntry';
export * from './verification/VerificationSession';

// Profile
export * from './profile/MemberProfile';
