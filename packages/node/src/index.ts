/**
 * @drumgrid/node
 *
 * Node.js utilities for drumgrid.
 * Requires Node.js 20+.
 */

export { NodeFileSink } from './NodeFileSink'
export type { NodeFileSinkOptions } from './NodeFileSink'
