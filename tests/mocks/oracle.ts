import type { DecisionOracle, OracleRequest, OracleResponse } from '../../src/types'

type Step =
  | OracleResponse
  | Error
  | ((request: OracleRequest, signal?: AbortSignal) => OracleResponse | Promise<OracleResponse>)

/**
 * In-process oracle that replays queued steps in order and records every
 * request it receives. An empty queue falls through to `fallback`.
 */
export class ScriptedOracle implements DecisionOracle {
  readonly requests: OracleRequest[] = []
  private readonly steps: Step[]

  constructor(
    steps: Step[] = [],
    private readonly fallback?: (request: OracleRequest) => OracleResponse
  ) {
    this.steps = [...steps]
  }

  queue(...steps: Step[]): this {
    this.steps.push(...steps)
    return this
  }

  async decide(request: OracleRequest, signal?: AbortSignal): Promise<OracleResponse> {
    this.requests.push(request)
    const step = this.steps.shift()
    if (step === undefined) {
      if (this.fallback) return this.fallback(request)
      throw new Error(`No scripted response for "${request.rawName}"`)
    }
    if (step instanceof Error) throw step
    if (typeof step === 'function') return step(request, signal)
    return step
  }
}

export const keep = (): OracleResponse => ({ action: 'keep', label: '' })

export const match = (label: string): OracleResponse => ({ action: 'match_existing', label })

export const create = (label: string, description?: string): OracleResponse => ({
  action: 'create_new',
  label,
  description,
})

/** Never settles unless the signal aborts. */
export const hang = (_request: OracleRequest, signal?: AbortSignal): Promise<OracleResponse> =>
  new Promise((_, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('aborted')))
  })
