import { mkdir } from 'node:fs/promises'
import { extract as tarExtract } from 'tar'
import type { ProvisionContext } from './context.js'
import { ProvisionError, ProvisionErrorCode } from './errors.js'
import { runCommand } from './exec.js'

export type ArchiveKind = 'tar.gz' | 'tar.bz2' | 'zip'

export type ExtractOptions = {
  archivePath: string
  destination: string
}

// Existing files at the destination are overwritten.
export async function extractTarGz(options: ExtractOptions): Promise<void> {
  const { archivePath, destination } = options

  await mkdir(destination, { recursive: true })

  await tarExtract({
    file: archivePath,
    cwd: destination,
  })
}

// node-tar has no bzip2 support, so this goes through the system tar.
export async function extractTarBz2(
  ctx: ProvisionContext,
  options: ExtractOptions,
): Promise<void> {
  const { archivePath, destination } = options

  await mkdir(destination, { recursive: true })
  await runCommand(ctx, ['tar', '-xjf', archivePath, '-C', destination])
}

export async function extractZip(
  ctx: ProvisionContext,
  options: ExtractOptions,
): Promise<void> {
  const { archivePath, destination } = options

  await mkdir(destination, { recursive: true })

  // node-tar reads tar only; zip goes through the system tools
  if (ctx.platform.isWindows) {
    await runCommand(ctx, [
      'powershell',
      '-Command',
      `Expand-Archive -Path '${archivePath}' -DestinationPath '${destination}' -Force`,
    ])
  } else {
    await runCommand(ctx, ['unzip', '-o', '-q', archivePath, '-d', destination])
  }
}

export function getArchiveType(filename: string): ArchiveKind | 'unknown' {
  if (filename.endsWith('.tar.gz') || filename.endsWith('.tgz')) {
    return 'tar.gz'
  }
  if (filename.endsWith('.tar.bz2') || filename.endsWith('.tbz2')) {
    return 'tar.bz2'
  }
  if (filename.endsWith('.zip')) {
    return 'zip'
  }
  return 'unknown'
}

export async function extractArchive(
  ctx: ProvisionContext,
  options: ExtractOptions & { kind?: ArchiveKind },
): Promise<void> {
  const archiveType = options.kind ?? getArchiveType(options.archivePath)

  switch (archiveType) {
    case 'tar.gz':
      return extractTarGz(options)
    case 'tar.bz2':
      return extractTarBz2(ctx, options)
    case 'zip':
      return extractZip(ctx, options)
    default:
      throw new ProvisionError(
        ProvisionErrorCode.UNSUPPORTED_ARCHIVE,
        `Unknown archive type for ${options.archivePath}. ` +
          `Supported formats: .tar.gz, .tgz, .tar.bz2, .tbz2, .zip`,
        { archivePath: options.archivePath },
      )
  }
}
