import { chmod, mkdir, mkdtemp, readdir, readlink, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { create as tarCreate } from 'tar'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  ProvisionErrorCode,
  createContext,
  isProvisionError,
} from '@bootstrap-kit/core'
import { FileDownloader, RecordingRunner } from '@bootstrap-kit/core/testing'
import {
  cmakeRecipe,
  getDownloadUrl,
  installCMake,
  parseCMakePackage,
} from '../src/index.js'

const LINUX_PACKAGE = 'cmake-3.10.2-Linux-x86_64.tar.gz'
const DARWIN_PACKAGE = 'cmake-3.10.2-Darwin-x86_64.tar.gz'

describe('parseCMakePackage', () => {
  it('splits a package name into its parts', () => {
    expect(parseCMakePackage(LINUX_PACKAGE)).toEqual({
      directory: 'cmake-3.10.2-Linux-x86_64',
      version: '3.10',
      patch: '2',
      platform: 'x86_64',
      archive: 'tar.gz',
    })
  })

  it('recognises zip packages', () => {
    expect(parseCMakePackage('cmake-3.10.2-win32-x86.zip')).toMatchObject({
      directory: 'cmake-3.10.2-win32-x86',
      platform: 'x86',
      archive: 'zip',
    })
  })

  it('keeps release candidate suffixes in the directory', () => {
    expect(parseCMakePackage('cmake-3.11.0-rc1-Linux-x86_64.tar.gz')).toMatchObject({
      directory: 'cmake-3.11.0-rc1-Linux-x86_64',
      version: '3.11',
      patch: '0',
    })
  })

  it('rejects names that do not follow the pattern', () => {
    expect(() => parseCMakePackage('not-a-valid-name.tar.gz')).toThrow(
      'Not a CMake package name: not-a-valid-name.tar.gz',
    )
  })
})

describe('getDownloadUrl', () => {
  it('points at the release directory of the major.minor version', () => {
    expect(getDownloadUrl(LINUX_PACKAGE)).toBe(
      'https://cmake.org/files/v3.10/cmake-3.10.2-Linux-x86_64.tar.gz',
    )
  })
})

describe('cmakeRecipe', () => {
  it('does not register an install into the working directory', () => {
    expect(cmakeRecipe(LINUX_PACKAGE, '.').register).toBe(false)
    expect(cmakeRecipe(LINUX_PACKAGE, '/opt').register).toBe(true)
  })
})

describe('installCMake', () => {
  let tmpDir: string
  let runner: RecordingRunner

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'bk-cmake-'))
    runner = new RecordingRunner()
  })

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true })
  })

  async function packageFixture(name: string, binDir: string): Promise<string> {
    const source = join(tmpDir, 'source')
    await mkdir(join(source, binDir), { recursive: true })
    await writeFile(join(source, binDir, 'cmake'), '#!/bin/sh\n')
    await chmod(join(source, binDir, 'cmake'), 0o755)
    const archive = join(tmpDir, name)
    await tarCreate({ gzip: true, file: archive, cwd: source }, [
      binDir.split('/')[0] ?? binDir,
    ])
    return archive
  }

  function context(os: NodeJS.Platform, downloader: FileDownloader, path = '') {
    return createContext({
      os,
      path,
      installDir: join(tmpDir, 'opt'),
      downloadDir: join(tmpDir, 'downloads'),
      globalBinDir: join(tmpDir, 'bin'),
      runner,
      downloader,
    })
  }

  it('installs a Linux package and links the binary', async () => {
    const archive = await packageFixture(
      LINUX_PACKAGE,
      'cmake-3.10.2-Linux-x86_64/bin',
    )
    const downloader = new FileDownloader({ [getDownloadUrl(LINUX_PACKAGE)]: archive })

    const result = await installCMake(context('linux', downloader), LINUX_PACKAGE)

    const binDir = join(tmpDir, 'opt', 'cmake-3.10.2-Linux-x86_64', 'bin')
    expect(result.status).toBe('installed')
    if (result.status !== 'installed') return
    expect(result.executable).toBe(join(binDir, 'cmake'))
    expect(result.context.searchPath.entries).toEqual([binDir])
    expect(await readlink(join(tmpDir, 'bin', 'cmake'))).toBe(join(binDir, 'cmake'))
    expect(await readdir(join(tmpDir, 'downloads'))).toEqual([])
  })

  it('finds the binary inside the app bundle on OS X', async () => {
    const archive = await packageFixture(
      DARWIN_PACKAGE,
      'cmake-3.10.2-Darwin-x86_64/CMake.app/Contents/bin',
    )
    const downloader = new FileDownloader({ [getDownloadUrl(DARWIN_PACKAGE)]: archive })

    const result = await installCMake(context('darwin', downloader), DARWIN_PACKAGE)

    expect(result.status === 'installed' && result.executable).toBe(
      join(
        tmpDir,
        'opt',
        'cmake-3.10.2-Darwin-x86_64',
        'CMake.app',
        'Contents',
        'bin',
        'cmake',
      ),
    )
  })

  it('uses the given install directory', async () => {
    const archive = await packageFixture(
      LINUX_PACKAGE,
      'cmake-3.10.2-Linux-x86_64/bin',
    )
    const downloader = new FileDownloader({ [getDownloadUrl(LINUX_PACKAGE)]: archive })
    const installDir = join(tmpDir, 'tools')

    const result = await installCMake(context('linux', downloader), LINUX_PACKAGE, {
      installDir,
    })

    expect(result.status === 'installed' && result.executable).toBe(
      join(installDir, 'cmake-3.10.2-Linux-x86_64', 'bin', 'cmake'),
    )
  })

  it('skips the install when cmake is already on the path', async () => {
    const existing = join(tmpDir, 'usr-bin')
    await mkdir(existing)
    await writeFile(join(existing, 'cmake'), '')
    await chmod(join(existing, 'cmake'), 0o755)
    const downloader = new FileDownloader()

    const result = await installCMake(
      context('linux', downloader, existing),
      LINUX_PACKAGE,
    )

    expect(result.status).toBe('skipped')
    expect(downloader.requests).toEqual([])
  })

  it('installs anyway when the check is turned off', async () => {
    const existing = join(tmpDir, 'usr-bin')
    await mkdir(existing)
    await writeFile(join(existing, 'cmake'), '')
    await chmod(join(existing, 'cmake'), 0o755)
    const archive = await packageFixture(
      LINUX_PACKAGE,
      'cmake-3.10.2-Linux-x86_64/bin',
    )
    const downloader = new FileDownloader({ [getDownloadUrl(LINUX_PACKAGE)]: archive })

    const result = await installCMake(
      context('linux', downloader, existing),
      LINUX_PACKAGE,
      { checkInstalled: false },
    )

    expect(result.status).toBe('installed')
    expect(downloader.requests).toHaveLength(1)
  })

  it('fails before downloading when the name cannot be parsed', async () => {
    const downloader = new FileDownloader()

    const error = await installCMake(
      context('linux', downloader),
      'not-a-valid-name.tar.gz',
    ).catch((e: unknown) => e)

    expect(isProvisionError(error, ProvisionErrorCode.PARSE_FAILED)).toBe(true)
    expect(downloader.requests).toEqual([])
  })
})
