/**
 * @equirect/core
 *
 * Core business logic package containing:
 * - Conversion phase machine
 * - Persistent job store
 * - Path validation
 * - Error handling
 * - Shared types
 */

// Phase machine
export {
  CONVERSION_PHASES,
  PhaseMachine,
  isValidTransition,
} from './phase.js';

export type {
  ConversionPhase,
  PhaseTransition,
} from './phase.js';

// Types
export {
  MIN_FOV,
  MAX_FOV,
  JOB_RECORD_VERSION,
  jobHeaderSchema,
  jobProgressSchema,
} from './types/job.js';

export type {
  ConversionJob,
  JobCreateInput,
  JobHeaderFile,
  JobProgressFile,
  StatusEvent,
  StatusEventError,
} from './types/job.js';

// Job store
export {
  JobStore,
  JOB_STORE_FILES,
  type JobStoreArtifact,
} from './store/jobStore.js';

// Validation
export {
  SUPPORTED_VIDEO_EXTENSIONS,
  validateInputVideo,
  validateOutputDir,
  validateFov,
  validateJobDir,
  assertNewJobInput,
} from './validation/pathValidator.js';

// Errors
export {
  ConverterError,
  ValidationError,
  CorruptJobError,
  ExternalToolError,
  FilesystemError,
  PhaseTransitionError,
  toConverterError,
  type ToolStep,
} from './errors/index.js';

// Binary Configuration
export {
  getBinariesConfig,
  binaries,
  getBinaryPath,
  type BinaryConfig,
  type BinariesConfig,
  type BinarySource,
} from './config/binaries.js';
