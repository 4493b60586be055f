import { join } from 'node:path'
import {
  runCommand,
  runRecipe,
  type InstallRecipe,
  type InstallResult,
  type ProvisionContext,
} from '@bootstrap-kit/core'

export const TOOL_NAME = 'f90cache'
export const F90CACHE_VERSION = '0.96'

const distribution = `f90cache-${F90CACHE_VERSION}`

export const DOWNLOAD_URL =
  `http://people.irisa.fr/Edouard.Canot/f90cache/${distribution}.tar.bz2`

// Built from source in a scratch directory; `make install` puts the binary
// on the default search path, so nothing is registered afterwards.
export const f90cacheRecipe: InstallRecipe = {
  name: TOOL_NAME,
  probe: TOOL_NAME,
  download: { url: DOWNLOAD_URL },
  archive: 'tar.bz2',
  extractTo: { kind: 'temporary', prefix: `${TOOL_NAME}-` },
  finish: async (root, ctx) => {
    const sourceDir = join(root, distribution)
    await runCommand(ctx, ['sh', 'configure'], { cwd: sourceDir })
    await runCommand(ctx, ['make', 'all', 'install'], { cwd: sourceDir })
    return null
  },
  register: false,
}

export async function installF90cache(
  ctx: ProvisionContext,
): Promise<InstallResult> {
  return runRecipe(ctx, f90cacheRecipe)
}
