import { NoopLogger } from './noopLogger';
import { JsonlLogger } from './jsonlLogger';
export type { Logger, MaybePromise } from './types';

export { NoopLogger, JsonlLogger };
