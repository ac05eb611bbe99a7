import { promises as fs } from 'fs'
import * as path from 'path'

const TOPOLOGY_EXTENSIONS = ['.yaml', '.yml']

/**
 * Reads a topology document for the TopologyLoader.
 * @throws Error if the file is not a YAML file or cannot be read
 */
export async function readTopologyFile (filePath: string): Promise<string> {
  const extension = path.extname(filePath).toLowerCase()
  if (!TOPOLOGY_EXTENSIONS.includes(extension)) {
    throw new Error(`Topology file must be a YAML file (.yaml or .yml): ${filePath}`)
  }

  try {
    return await fs.readFile(filePath, 'utf8')
  } catch (error) {
    throw new Error(`Cannot read topology file ${filePath}: ${error instanceof Error ? error.message : String(error)}`)
  }
}
