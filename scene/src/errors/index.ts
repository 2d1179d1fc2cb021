/**
 * Error types for the scene package.
 *
 * Error Class Hierarchy:
 *   SceneError (base class)
 *   ├── InvalidFrameSetError - frame set failed validation
 *   ├── UnknownFrameSetError - strict play of an unregistered clip
 *   ├── ChildCycleError - node added under itself or a descendant
 *   └── ConfigError - environment validation failed
 */

export {
  SceneError,
  SceneErrorCode,
  InvalidFrameSetError,
  UnknownFrameSetError,
  ChildCycleError,
  ConfigError,
  isSceneError,
  type SceneErrorContext,
} from './sceneErrors.js';
