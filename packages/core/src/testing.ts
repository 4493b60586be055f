// In-process stand-ins for the command runner and downloader. Nothing here
// starts a process or opens a socket.
import { copyFile, mkdir, stat } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { DownloadRequest, DownloadResult, Downloader } from './download.js'
import { ProvisionError, ProvisionErrorCode } from './errors.js'
import type { Command, CommandRunner, ExecResult } from './exec.js'

type Matcher = string[] | ((argv: string[]) => boolean)

type Responder =
  | Partial<ExecResult>
  | ((command: Command) => Partial<ExecResult> | Promise<Partial<ExecResult>>)

function matches(matcher: Matcher, argv: string[]): boolean {
  if (typeof matcher === 'function') return matcher(argv)
  return matcher.every((part, i) => argv[i] === part)
}

/**
 * Records every command and answers with scripted results. Unmatched
 * commands succeed with empty output. The first matching handler wins.
 */
export class RecordingRunner implements CommandRunner {
  readonly commands: Command[] = []
  private readonly handlers: { matcher: Matcher; responder: Responder }[] = []

  on(matcher: Matcher, responder: Responder): this {
    this.handlers.push({ matcher, responder })
    return this
  }

  get argvs(): string[][] {
    return this.commands.map((command) => command.argv)
  }

  async run(command: Command): Promise<ExecResult> {
    this.commands.push(command)
    const handler = this.handlers.find(({ matcher }) =>
      matches(matcher, command.argv),
    )
    const { responder } = handler ?? { responder: {} }
    const result =
      typeof responder === 'function' ? await responder(command) : responder

    return { stdout: '', stderr: '', exitCode: 0, durationMs: 0, ...result }
  }
}

/** Serves downloads by copying local files registered per URL. */
export class FileDownloader implements Downloader {
  readonly requests: DownloadRequest[] = []

  constructor(private readonly files: Record<string, string> = {}) {}

  async download(request: DownloadRequest): Promise<DownloadResult> {
    this.requests.push(request)
    const source = this.files[request.url]
    if (!source) {
      throw new ProvisionError(
        ProvisionErrorCode.DOWNLOAD_FAILED,
        `Failed to download ${request.url}: 404 Not Found`,
        { url: request.url, status: 404 },
      )
    }

    await mkdir(dirname(request.destination), { recursive: true })
    await copyFile(source, request.destination)
    const { size } = await stat(request.destination)
    return { path: request.destination, size }
  }
}
