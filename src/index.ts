// Types
export * from './middleware/types';

// Configuration
export * from './middleware/config/provider-config';

// Providers and errors
export * from './middleware/services/imagegen/providers';
export * from './middleware/services/imagegen/translators';

// Service
export * from './middleware/services/imagegen/image-generation.service';

// Utilities
export * from './middleware/services/imagegen/utils/http-client';
export * from './middleware/services/imagegen/utils/job-engine';
export * from './middleware/services/imagegen/utils/logger';
export * from './middleware/services/imagegen/utils/model-cache';
export * from './middleware/services/imagegen/utils/timer';
