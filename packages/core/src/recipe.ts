import type { ProvisionContext } from './context.js'
import { withDownload, type DownloadSource } from './download.js'
import { extractArchive, type ArchiveKind } from './extract.js'
import { logger } from './logger.js'
import { addToPath } from './path-registry.js'
import { isInstalled } from './probe.js'
import { withTempDir } from './temp.js'

export type ExtractTarget =
  | { kind: 'directory'; path: string }
  | { kind: 'temporary'; prefix?: string }

/**
 * A download-and-extract install described as data. `finish` runs once the
 * archive is unpacked under `root` and returns the installed executable, or
 * null when there is nothing to register.
 */
export type InstallRecipe = {
  name: string
  probe: string
  download: DownloadSource
  archive: ArchiveKind
  extractTo: ExtractTarget
  finish: (root: string, ctx: ProvisionContext) => Promise<string | null>
  register: boolean
}

export type RecipeOptions = {
  checkInstalled?: boolean
  /** Overrides the context's download directory for this install only. */
  downloadDir?: string
}

export type InstallResult =
  | { status: 'skipped'; context: ProvisionContext }
  | { status: 'installed'; executable: string | null; context: ProvisionContext }

async function unpack(
  ctx: ProvisionContext,
  recipe: InstallRecipe,
  root: string,
): Promise<string | null> {
  await withDownload(ctx, recipe.download, (archivePath) =>
    extractArchive(ctx, {
      archivePath,
      destination: root,
      kind: recipe.archive,
    }),
  )
  return recipe.finish(root, ctx)
}

export async function runRecipe(
  ctx: ProvisionContext,
  recipe: InstallRecipe,
  options: RecipeOptions = {},
): Promise<InstallResult> {
  const { checkInstalled = true, downloadDir = ctx.downloadDir } = options

  if (checkInstalled && (await isInstalled(ctx, recipe.probe))) {
    return { status: 'skipped', context: ctx }
  }

  logger.info({ recipe: recipe.name }, `Installing ${recipe.name}`)

  const scratch = { ...ctx, downloadDir }
  const target = recipe.extractTo
  const executable =
    target.kind === 'directory'
      ? await unpack(scratch, recipe, target.path)
      : await withTempDir(
          { prefix: target.prefix ?? `${recipe.name}-`, parent: downloadDir },
          (dir) => unpack(scratch, recipe, dir),
        )

  const context =
    recipe.register && executable ? await addToPath(ctx, executable) : ctx

  return { status: 'installed', executable, context }
}
