import { promises as fs } from 'fs'
import * as path from 'path'
import { Debugger } from '@utils/debug'
import { GenerationResult, NodeArtifacts } from '../types/render.types'

/** Sub-directory of the work directory holding per-node output */
export const CONFIGS_DIR = 'configs'

/**
 * Persists generated artifacts. Implementations decide directory layout and
 * overwrite semantics.
 */
export interface ArtifactWriter {
  write (result: GenerationResult): Promise<string[]>
}

/**
 * FileSystemArtifactWriter writes each node's artifacts below
 * `<rootDir>/configs/<node>/`, creating directories as needed and replacing
 * existing files.
 *
 * @example
 * const writer = new FileSystemArtifactWriter('./work')
 * const written = await writer.write(result)
 * // => ['work/configs/R1/etc/hostname', ...]
 */
export class FileSystemArtifactWriter implements ArtifactWriter {
  private debug: Debugger

  constructor (private readonly rootDir: string) {
    this.debug = new Debugger('writer')
  }

  /**
   * Directory a node's artifacts are written to
   */
  nodeDir (nodeName: string): string {
    return path.join(this.rootDir, CONFIGS_DIR, nodeName)
  }

  /**
   * Writes every node of a generation result.
   * @returns paths of the written files
   */
  async write (result: GenerationResult): Promise<string[]> {
    const written: string[] = []
    for (const node of result.nodes) {
      written.push(...await this.writeNode(node))
    }
    this.debug.log(`Wrote ${written.length} files for topology ${result.topologyId}`)
    return written
  }

  async writeNode (node: NodeArtifacts): Promise<string[]> {
    const baseDir = path.resolve(this.nodeDir(node.node))
    const written: string[] = []

    for (const artifact of node.artifacts) {
      const target = path.resolve(baseDir, artifact.path)
      if (!target.startsWith(baseDir + path.sep)) {
        throw new Error(`Artifact path ${artifact.path} escapes the directory of node ${node.node}`)
      }

      try {
        await fs.mkdir(path.dirname(target), { recursive: true })
        await fs.writeFile(target, artifact.content, 'utf8')
      } catch (error) {
        const message = `Failed to write ${target}: ${error instanceof Error ? error.message : String(error)}`
        this.debug.log('error', message)
        throw new Error(message)
      }
      written.push(target)
    }

    return written
  }
}
