/**
 * @drumgrid/node - NodeFileSink
 *
 * File sink backed by the file system.
 * Implements the FileSink contract from @drumgrid/core.
 */

import * as fs from 'fs'
import * as path from 'path'
import type { FileSink } from '@drumgrid/core'

// =============================================================================
// Types
// =============================================================================

/**
 * NodeFileSink configuration options.
 */
export interface NodeFileSinkOptions {
  /** Directory relative names are resolved against (default: process.cwd()) */
  baseDir?: string

  /** Create missing parent directories before writing (default: false) */
  mkdir?: boolean
}

// =============================================================================
// NodeFileSink Implementation
// =============================================================================

/**
 * Writes encoded files to disk. Write errors reject the returned promise
 * untouched, so the exporter can report them.
 *
 * @example
 * ```typescript
 * import { DrumMachine } from '@drumgrid/core'
 * import { NodeFileSink } from '@drumgrid/node'
 *
 * const machine = DrumMachine.create({ fileSink: new NodeFileSink({ mkdir: true }) })
 * await machine.export('out/beat.mid')
 * ```
 */
export class NodeFileSink implements FileSink {
  private options: Required<NodeFileSinkOptions>

  constructor(options: NodeFileSinkOptions = {}) {
    this.options = {
      baseDir: options.baseDir ?? process.cwd(),
      mkdir: options.mkdir ?? false
    }
  }

  /**
   * Absolute path a filename is written to.
   */
  resolve(filename: string): string {
    return path.resolve(this.options.baseDir, filename)
  }

  async write(filename: string, bytes: Uint8Array): Promise<void> {
    const target = this.resolve(filename)

    if (this.options.mkdir) {
      await fs.promises.mkdir(path.dirname(target), { recursive: true })
    }

    await fs.promises.writeFile(target, bytes)
  }
}
