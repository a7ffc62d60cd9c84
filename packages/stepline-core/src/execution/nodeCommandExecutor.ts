import { spawn, type ChildProcess } from 'node:child_process'

import type {
  CommandExecutionRequest,
  CommandExecutionResult,
  CommandExecutor,
} from '../contracts/executor.js'
import { BoundedOutputBuffer } from './boundedOutputBuffer.js'

/** Default cap for each captured output stream (1 MiB). */
export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024

/** Default delay between SIGTERM and SIGKILL. */
export const DEFAULT_KILL_GRACE_MS = 5000

// Children lead their own process group on POSIX so termination reaches
// grandchildren that still hold the output pipes.
const USE_PROCESS_GROUP = process.platform !== 'win32'

/**
 * Creates a Node.js command executor that spawns argv vectors without a shell.
 *
 * @returns Command executor implementation.
 */
export const createNodeCommandExecutor = (): CommandExecutor => {
  return async (request: CommandExecutionRequest): Promise<CommandExecutionResult> => {
    const startedAt = Date.now()
    const [file, ...args] = request.argv

    if (file === undefined || file.length === 0) {
      return createLaunchFailure(startedAt, new Error('Command argv must not be empty'))
    }

    if (request.signal?.aborted) {
      return createEmptyResult('cancelled', startedAt)
    }

    const maxOutputBytes = request.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES
    const killGraceMs = request.killGraceMs ?? DEFAULT_KILL_GRACE_MS

    let child: ChildProcess
    try {
      child = spawn(file, args, {
        cwd: request.cwd,
        env: { ...process.env, ...request.env },
        shell: false,
        detached: USE_PROCESS_GROUP,
        windowsHide: true,
        stdio: ['ignore', 'pipe', 'pipe'],
      })
    } catch (spawnError: unknown) {
      return createLaunchFailure(startedAt, spawnError)
    }

    return await new Promise<CommandExecutionResult>((resolve) => {
      const stdout = new BoundedOutputBuffer(maxOutputBytes)
      const stderr = new BoundedOutputBuffer(maxOutputBytes)

      let spawned = false
      let settled = false
      let terminationCause: 'cancelled' | 'timed_out' | null = null
      let runtimeError: unknown
      let killHandle: NodeJS.Timeout | null = null

      const terminate = (cause: 'cancelled' | 'timed_out'): void => {
        if (settled || terminationCause !== null) {
          return
        }

        terminationCause = cause
        signalChild(child, 'SIGTERM')
        killHandle = setTimeout(() => {
          signalChild(child, 'SIGKILL')
        }, killGraceMs)
      }

      const onAbort = (): void => {
        terminate('cancelled')
      }

      const timeoutHandle =
        typeof request.timeoutMs === 'number' && request.timeoutMs > 0
          ? setTimeout(() => {
              terminate('timed_out')
            }, request.timeoutMs)
          : null

      const finish = (result: CommandExecutionResult): void => {
        if (settled) {
          return
        }

        settled = true
        if (timeoutHandle) {
          clearTimeout(timeoutHandle)
        }
        if (killHandle) {
          clearTimeout(killHandle)
        }
        request.signal?.removeEventListener('abort', onAbort)
        resolve(result)
      }

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout.append(chunk)
      })

      child.stderr?.on('data', (chunk: Buffer) => {
        stderr.append(chunk)
      })

      child.once('spawn', () => {
        spawned = true
      })

      child.on('error', (error: Error) => {
        if (!spawned) {
          finish(createLaunchFailure(startedAt, error))
          return
        }

        runtimeError = error
      })

      child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        finish({
          outcome: terminationCause ?? 'exited',
          durationMs: Date.now() - startedAt,
          exitCode,
          signal,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          truncated: stdout.truncated || stderr.truncated,
          error: runtimeError,
        })
      })

      request.signal?.addEventListener('abort', onAbort, { once: true })
    })
  }
}

const signalChild = (child: ChildProcess, signal: NodeJS.Signals): void => {
  if (child.pid === undefined) {
    return
  }

  if (USE_PROCESS_GROUP) {
    try {
      process.kill(-child.pid, signal)
      return
    } catch (error: unknown) {
      // ESRCH: the whole group is already gone.
      if (isErrnoException(error) && error.code === 'ESRCH') {
        return
      }
    }
  }

  child.kill(signal)
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException => {
  return error instanceof Error && 'code' in error
}

const createLaunchFailure = (startedAt: number, error: unknown): CommandExecutionResult => {
  return {
    ...createEmptyResult('launch_failed', startedAt),
    error,
  }
}

const createEmptyResult = (
  outcome: CommandExecutionResult['outcome'],
  startedAt: number
): CommandExecutionResult => {
  return {
    outcome,
    durationMs: Date.now() - startedAt,
    exitCode: null,
    signal: null,
    stdout: '',
    stderr: '',
    truncated: false,
  }
}
