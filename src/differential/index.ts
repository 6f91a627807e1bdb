// Export all types
export * from './types/index.js';

// Message model and classification core
export * from './headers.js';
export { normalizeRequest } from './RequestNormalizer.js';
export {
    BENIGN_REJECTION_RULES,
    findBenignRejection,
    type AcceptRejectPair,
    type BenignRejectionRule,
} from './BenignRejections.js';
export {
    categorizeDiscrepancy,
    findDiscrepancy,
    comparePair,
    comparePosition,
    type PositionOutcome,
    type PositionSide,
} from './DiscrepancyClassifier.js';

// Errors
export {
    ClassificationErrorType,
    ClassificationErrorHandler,
    ClassificationRequestError,
    InvariantViolationError,
    ProfileConfigurationError,
    UnknownProfileError,
    assertInvariant,
    classificationErrorHandler,
} from './ErrorHandler.js';

// Configuration and profiles
export {
    ConfigurationManager,
    ConfigurationError,
    getConfigurationManager,
    initializeConfigurationManager,
} from './ConfigurationManager.js';
export {
    ProfileRegistry,
    getProfileRegistry,
    initializeProfileRegistry,
    parseProfileTable,
    serverProfileSchema,
    profileTableSchema,
    type ServerProfileDefinition,
} from './ProfileRegistry.js';

// Payload validation
export {
    createClassifyRequestSchema,
    describeIssues,
    normalizeRequestSchema,
    parsedRequestSchema,
    parsedResponseSchema,
    resultEntrySchema,
    type ClassifyRequestBody,
    type NormalizeRequestBody,
} from './schemas.js';

// Service
export {
    ClassificationService,
    getClassificationService,
    type ClassificationOutcome,
    type ServerResults,
} from './ClassificationService.js';
