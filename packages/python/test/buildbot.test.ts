import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createContext } from '@bootstrap-kit/core'
import { FileDownloader, RecordingRunner } from '@bootstrap-kit/core/testing'
import { installBuildAgent } from '../src/index.js'
import { importFails } from './helpers.js'

describe('installBuildAgent', () => {
  let tmpDir: string
  let runner: RecordingRunner

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'bk-buildbot-'))
    runner = new RecordingRunner()
  })

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true })
  })

  function context(os: NodeJS.Platform) {
    return createContext({
      os,
      path: '',
      downloadDir: tmpDir,
      runner,
      downloader: new FileDownloader(),
    })
  }

  it('leaves an existing agent alone', async () => {
    const result = await installBuildAgent(context('darwin'), 'mac-agent', {
      path: tmpDir,
    })

    expect(result).toBeNull()
    expect(runner.commands).toEqual([])
  })

  it('creates the service account and the agent on Linux', async () => {
    runner
      .on(['getent'], { exitCode: 2 })
      .on(importFails('twisted', 'buildbot'), { exitCode: 1 })
    const path = join(tmpDir, 'agent')

    const result = await installBuildAgent(context('linux'), 'linux-agent', { path })

    expect(result).toBe(path)
    expect(runner.argvs).toEqual([
      ['getent', 'passwd', 'buildbot'],
      [
        'sudo',
        'useradd',
        '--system',
        '--home',
        '/var/lib/buildbot',
        '--create-home',
        '--shell',
        '/bin/false',
        'buildbot',
      ],
      expect.arrayContaining(['twisted']),
      expect.arrayContaining(['pip']),
      ['pip', 'install', 'twisted==15.4.0'],
      expect.arrayContaining(['buildbot']),
      expect.arrayContaining(['pip']),
      ['pip', 'install', 'buildbot-slave'],
      [
        'sudo',
        '-u',
        'buildbot',
        'buildslave',
        'create-slave',
        path,
        '10.0.2.2',
        'linux-agent',
        'pass',
      ],
    ])
  })

  it('puts the agent in the existing account home by default', async () => {
    runner.on(['getent'], {
      stdout: 'buildbot:x:999:999::/srv/buildbot:/bin/false\n',
    })

    const result = await installBuildAgent(context('linux'), 'linux-agent', {
      coordinator: '192.168.50.1',
    })

    expect(result).toBe('/srv/buildbot/slave')
    expect(runner.argvs.some((argv) => argv.includes('useradd'))).toBe(false)
    expect(runner.argvs.at(-1)).toEqual([
      'sudo',
      '-u',
      'buildbot',
      'buildslave',
      'create-slave',
      '/srv/buildbot/slave',
      '192.168.50.1',
      'linux-agent',
      'pass',
    ])
  })

  it('runs the agent script directly on Windows', async () => {
    const path = join(tmpDir, 'agent')

    await installBuildAgent(context('win32'), 'win-agent', {
      path,
      scriptDir: 'scripts',
      shell: true,
    })

    const create = runner.commands.at(-1)
    expect(create?.argv).toEqual([
      join('scripts', 'buildslave'),
      'create-slave',
      path,
      '10.0.2.2',
      'win-agent',
      'pass',
    ])
    expect(create?.shell).toBe(true)
  })
})
