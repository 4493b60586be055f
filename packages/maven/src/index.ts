import { join } from 'node:path'
import {
  runRecipe,
  type InstallRecipe,
  type InstallResult,
  type ProvisionContext,
} from '@bootstrap-kit/core'

export const TOOL_NAME = 'mvn'
export const DISPLAY_NAME = 'Maven'
// 3.2.5 is the last Maven release that runs on Java 6.
export const MAVEN_VERSION = '3.2.5'

const distribution = `apache-maven-${MAVEN_VERSION}`

export const DOWNLOAD_URL =
  `http://mirrors.sonic.net/apache/maven/maven-3/${MAVEN_VERSION}` +
  `/binaries/${distribution}-bin.tar.gz`

export function mavenRecipe(installDir: string): InstallRecipe {
  return {
    name: DISPLAY_NAME,
    probe: TOOL_NAME,
    download: { url: DOWNLOAD_URL },
    archive: 'tar.gz',
    extractTo: { kind: 'directory', path: installDir },
    finish: async (root) => join(root, distribution, 'bin', TOOL_NAME),
    register: true,
  }
}

export type InstallMavenOptions = {
  installDir?: string
  downloadDir?: string
}

export async function installMaven(
  ctx: ProvisionContext,
  options: InstallMavenOptions = {},
): Promise<InstallResult> {
  const installDir = options.installDir ?? ctx.installDir
  return runRecipe(ctx, mavenRecipe(installDir), {
    downloadDir: options.downloadDir,
  })
}
