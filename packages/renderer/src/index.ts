/**
 * @rwkit/renderer
 *
 * Three.js bridge for decoded chunk trees.
 */
export { ClumpMeshBuilder } from './clump-mesh-builder.js';
