import {
  ProvisionError,
  ProvisionErrorCode,
  logger,
  probeCommand,
  runCommand,
  withDownload,
  type ProvisionContext,
} from '@bootstrap-kit/core'

export const GET_PIP_URL = 'https://bootstrap.pypa.io/get-pip.py'

// The module name travels as an argument, never as code.
const IMPORT_SCRIPT = 'import importlib, sys; importlib.import_module(sys.argv[1])'

const MODULE_NAME = /^[A-Za-z_]\w*(\.[A-Za-z_]\w*)*$/

/**
 * Returns true iff the context's Python interpreter can import `module`.
 * Throws INVALID_INPUT when `module` is not a dotted identifier.
 */
export async function moduleExists(
  ctx: ProvisionContext,
  module: string,
): Promise<boolean> {
  if (!MODULE_NAME.test(module)) {
    throw new ProvisionError(
      ProvisionErrorCode.INVALID_INPUT,
      `Not a Python module name: ${module}. Pass the module to test explicitly`,
      { module },
    )
  }
  return probeCommand(ctx, [ctx.python, '-c', IMPORT_SCRIPT, module])
}

/** `twisted==15.4.0` is tested as `twisted`. */
export function moduleNameFor(spec: string): string {
  return spec.split('==')[0] ?? spec
}

async function bootstrapPip(ctx: ProvisionContext): Promise<void> {
  logger.info('pip is not installed, bootstrapping it')
  await withDownload(ctx, { url: GET_PIP_URL }, async (script) => {
    await runCommand(ctx, [ctx.python, script])
  })
}

/**
 * Installs a package with pip unless `testModule` (by default the package
 * name without its version pin) is already importable.
 */
export async function installPythonPackage(
  ctx: ProvisionContext,
  spec: string,
  testModule?: string,
): Promise<'installed' | 'skipped'> {
  const module = testModule || moduleNameFor(spec)
  if (await moduleExists(ctx, module)) {
    return 'skipped'
  }

  if (!(await moduleExists(ctx, 'pip'))) {
    await bootstrapPip(ctx)
  }

  logger.info({ spec }, `Installing ${spec}`)
  await runCommand(ctx, [ctx.pip, 'install', spec])
  return 'installed'
}
