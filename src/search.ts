/**
 * Exact Search
 *
 * Two-pass branch-and-bound over an abstract array of boolean decisions.
 * Pass 1 maximizes how many decisions are "selected" subject to pairwise
 * conflicts; pass 2 fixes that count and minimizes the sequence-dependent
 * transition cost between consecutive selections. Decisions are taken in
 * index order, "select" before "skip", and the incumbent only changes on a
 * strict improvement, so the first optimum in that order is the one kept.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * The problem as the search sees it. Indices are dense, `0 .. size - 1`, and
 * transitions are only ever priced from a lower index to a higher one.
 */
export interface DecisionModel {
  readonly size: number
  /** Indices that may not be selected together with `index` */
  neighbours(index: number): readonly number[]
  /** Cost of selecting `next` right after `prev`, with nothing between selected */
  transitionCost(prev: number, next: number): number
  /**
   * Optional exclusivity label: at most one index per group can be selected.
   * Only used to tighten the attendance bound; the conflict itself must also
   * be present in `neighbours`.
   */
  group?(index: number): number
}

export type SearchPhase = 'attendance' | 'transit'

export type SearchStatus = 'optimal' | 'interrupted'

export type SearchSnapshot = {
  phase: SearchPhase
  attendance: number
  totalTransit: number
  selected: readonly boolean[]
}

export type SearchLimits = {
  /** Node budget shared by both passes */
  maxIterations?: number
  /** Wall-clock budget shared by both passes */
  timeLimitMs?: number
}

export type SearchOptions = SearchLimits & {
  onImprovement?: (snapshot: SearchSnapshot) => void
}

export type SearchStats = {
  attendanceNodes: number
  transitNodes: number
  improvements: number
  elapsedMs: number
}

export type SearchOutcome = {
  selected: boolean[]
  attendance: number
  totalTransit: number
  status: SearchStatus
  stats: SearchStats
}

// ============================================================================
// Incumbent
// ============================================================================

type Candidate = {
  attendance: number
  totalTransit: number
  selected: readonly boolean[]
}

/**
 * Best assignment found so far. Only ever tightens: a candidate replaces it
 * when it has more attendance, or equal attendance and less transit.
 */
export class Incumbent {
  private current: Candidate

  constructor(initial: Candidate) {
    this.current = { ...initial, selected: [...initial.selected] }
  }

  get attendance(): number {
    return this.current.attendance
  }

  get totalTransit(): number {
    return this.current.totalTransit
  }

  get selected(): readonly boolean[] {
    return this.current.selected
  }

  isImprovedBy(attendance: number, totalTransit: number): boolean {
    if (attendance !== this.current.attendance) return attendance > this.current.attendance
    return totalTransit < this.current.totalTransit
  }

  offer(candidate: Candidate): boolean {
    if (!this.isImprovedBy(candidate.attendance, candidate.totalTransit)) return false
    this.current = { ...candidate, selected: [...candidate.selected] }
    return true
  }
}

// ============================================================================
// Search
// ============================================================================

// Check wall-clock every 1024 nodes to avoid Date.now() overhead
const DEADLINE_CHECK_MASK = 0x3FF

/** Transit of an assignment, charging each selection against the previous one */
export function totalTransitOf(model: DecisionModel, selected: readonly boolean[]): number {
  let total = 0
  let last = -1
  for (let i = 0; i < model.size; i++) {
    if (!selected[i]) continue
    if (last >= 0) total += model.transitionCost(last, i)
    last = i
  }
  return total
}

export function solveTwoPhase(model: DecisionModel, options: SearchOptions = {}): SearchOutcome {
  const n = model.size
  const startedAt = Date.now()
  const deadline = options.timeLimitMs !== undefined ? startedAt + options.timeLimitMs : undefined

  const selected: boolean[] = new Array<boolean>(n).fill(false)
  // Number of currently selected indices conflicting with each index
  const blocked = new Int32Array(n)

  const groupIds = new Map<number, number>()
  const groupOf = new Int32Array(n)
  for (let i = 0; i < n; i++) {
    const label = model.group?.(i) ?? i
    let id = groupIds.get(label)
    if (id === undefined) {
      id = groupIds.size
      groupIds.set(label, id)
    }
    groupOf[i] = id
  }
  const groupStamp = new Int32Array(groupIds.size)
  let stamp = 0

  const incumbent = new Incumbent({ attendance: 0, totalTransit: 0, selected })
  const counters = { nodes: 0, bailed: false }
  let improvements = 0
  let phase: SearchPhase = 'attendance'

  function tick(): boolean {
    if (counters.bailed) return true
    counters.nodes++
    if (options.maxIterations !== undefined && counters.nodes > options.maxIterations) {
      counters.bailed = true
      return true
    }
    if (deadline !== undefined && (counters.nodes & DEADLINE_CHECK_MASK) === 0) {
      if (Date.now() > deadline) {
        counters.bailed = true
        return true
      }
    }
    return false
  }

  /** Distinct groups among undecided indices still compatible with the selection */
  function openGroupsFrom(index: number): number {
    stamp++
    let open = 0
    for (let j = index; j < n; j++) {
      if (blocked[j] !== 0) continue
      const g = groupOf[j] ?? j
      if (groupStamp[g] === stamp) continue
      groupStamp[g] = stamp
      open++
    }
    return open
  }

  function select(index: number): void {
    selected[index] = true
    for (const other of model.neighbours(index)) blocked[other] = (blocked[other] ?? 0) + 1
  }

  function unselect(index: number): void {
    selected[index] = false
    for (const other of model.neighbours(index)) blocked[other] = (blocked[other] ?? 0) - 1
  }

  function record(attendance: number, totalTransit: number): void {
    if (!incumbent.offer({ attendance, totalTransit, selected })) return
    improvements++
    options.onImprovement?.({
      phase,
      attendance,
      totalTransit,
      selected: [...selected],
    })
  }

  function maximize(index: number, count: number, cost: number, last: number): void {
    if (tick()) return
    if (index === n) {
      if (count > incumbent.attendance) record(count, cost)
      return
    }
    if (count + openGroupsFrom(index) <= incumbent.attendance) return

    if (blocked[index] === 0) {
      const step = last >= 0 ? model.transitionCost(last, index) : 0
      select(index)
      maximize(index + 1, count + 1, cost + step, index)
      unselect(index)
      if (counters.bailed) return
    }
    maximize(index + 1, count, cost, last)
  }

  function minimize(index: number, count: number, cost: number, last: number, target: number): void {
    if (tick()) return
    if (cost >= incumbent.totalTransit) return
    if (index === n) {
      if (count === target) record(count, cost)
      return
    }
    if (count + openGroupsFrom(index) < target) return

    if (blocked[index] === 0 && count < target) {
      const step = last >= 0 ? model.transitionCost(last, index) : 0
      select(index)
      minimize(index + 1, count + 1, cost + step, index, target)
      unselect(index)
      if (counters.bailed) return
    }
    minimize(index + 1, count, cost, last, target)
  }

  maximize(0, 0, 0, -1)
  const attendanceNodes = counters.nodes

  if (!counters.bailed) {
    phase = 'transit'
    minimize(0, 0, 0, -1, incumbent.attendance)
  }

  return {
    selected: [...incumbent.selected],
    attendance: incumbent.attendance,
    totalTransit: incumbent.totalTransit,
    status: counters.bailed ? 'interrupted' : 'optimal',
    stats: {
      attendanceNodes,
      transitNodes: counters.nodes - attendanceNodes,
      improvements,
      elapsedMs: Date.now() - startedAt,
    },
  }
}
