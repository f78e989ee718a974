/**
 * Gap removal exports
 * @module transform
 */

export { GapResolution, resolveAxis, resolveGaps } from './gap-resolver';
export { cleanBoxAt, transformPanels, transformDefects, cleanedExtent } from './coordinate-transformer';
