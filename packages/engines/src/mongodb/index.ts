import type { UnsupportedEngineAdapter } from '../types.js';

export const mongodbEngine: UnsupportedEngineAdapter = {
  id: 'mongodb',
  displayName: 'MongoDB',
  supported: false,
  engineFilter: 'mongodb',
  defaultPort: 27017,
  serviceType: 'mongodb',
  notice: 'MongoDB integration is not yet supported. Stay tuned for future updates.',
};
