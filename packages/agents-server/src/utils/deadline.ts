export type DeadlineResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'error'; error: unknown }
  | { status: 'timeout'; timeoutMs: number }
  | { status: 'aborted'; reason: unknown }

export class DeadlineExceededError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`)
    this.name = 'DeadlineExceededError'
  }
}

/**
 * Runs `fn` with its own AbortSignal and settles on whichever comes first:
 * the task, the timeout, or the parent signal. A task still running after
 * that is aborted and its late result or rejection is discarded.
 */
export function runWithDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<DeadlineResult<T>> {
  const controller = new AbortController()

  return new Promise<DeadlineResult<T>>((resolve) => {
    let settled = false
    let timer: ReturnType<typeof setTimeout> | undefined

    const onParentAbort = () => {
      controller.abort(parent?.reason)
      finish({ status: 'aborted', reason: parent?.reason })
    }

    const finish = (result: DeadlineResult<T>) => {
      if (settled) return
      settled = true
      if (timer) clearTimeout(timer)
      parent?.removeEventListener('abort', onParentAbort)
      resolve(result)
    }

    if (parent?.aborted) {
      onParentAbort()
      return
    }
    parent?.addEventListener('abort', onParentAbort, { once: true })

    timer = setTimeout(() => {
      controller.abort(new DeadlineExceededError(timeoutMs))
      finish({ status: 'timeout', timeoutMs })
    }, timeoutMs)

    let task: Promise<T>
    try {
      task = fn(controller.signal)
    } catch (error) {
      finish({ status: 'error', error })
      return
    }
    task.then(
      (value) => finish({ status: 'ok', value }),
      (error: unknown) => finish({ status: 'error', error })
    )
  })
}
