/**
 * Sprite scene graph
 * @module sprite
 */

export { SceneNode, type NodeId } from './SceneNode.js';
export type { ISceneNodeDocumentation } from './sceneNode.doc.js';
export { FrameSet, type FrameSetInit } from './FrameSet.js';
export { FrameAnimator, type AnimatorState } from './FrameAnimator.js';
export { ChildCollection, type Identifiable } from './ChildCollection.js';
