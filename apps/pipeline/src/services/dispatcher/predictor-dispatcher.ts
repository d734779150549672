import path from 'path'
import pLimit from 'p-limit'
import type {
  EnsembleMember,
  EnsembleResult,
  MemberPlan
} from '@rnaflow/types'
import { logger } from '../../helpers/loggers.js'
import { getErrorMessage } from '../../helpers/errors.js'
import { makeDir } from '../../helpers/files.js'
import { assignDevices } from '../scheduler/device-scheduler.js'
import {
  failure,
  type InvocationContext,
  type PredictionInputs,
  type PredictionOutcome,
  type PredictorBackend
} from '../predictors/predictor.js'

export interface DispatchOptions {
  inputs: PredictionInputs
  /** Backend working directory, e.g. <runDir>/predictions/<backend> */
  workDir: string
  /** Directory receiving <label>.log files */
  logDir: string
  devices: readonly string[]
  maxParallelDevices: number
  /** Overrides the backend's own timeout */
  timeoutMs?: number
  signal?: AbortSignal
  onMemberDone?: (member: EnsembleMember) => void
}

interface Task {
  label: string
  device: string
  members: MemberPlan[]
}

const usesBatch = (backend: PredictorBackend): boolean => {
  switch (backend.batchMode) {
    case 'never':
      return false
    case 'always':
      if (!backend.predictBatch) {
        logger.warn(`${backend.name}: batch mode requested but not supported, running per member`)
      }
      return Boolean(backend.predictBatch)
    default:
      return backend.capabilities.batch && Boolean(backend.predictBatch)
  }
}

const deviceLabel = (device: string) => device.replace(/[^A-Za-z0-9_-]/g, '_')

/**
 * Splits members into invocation tasks. Batching puts every member of a
 * device into one task; exclusive backends run one task per device with
 * members in sequence; other backends get one task per member.
 */
const planTasks = (
  backend: PredictorBackend,
  members: MemberPlan[],
  devices: string[],
  batch: boolean
): Task[] => {
  if (!batch && !backend.capabilities.exclusiveDevice) {
    return members.map((m, i) => ({
      label: `member_${m.seedIndex}`,
      device: devices[i],
      members: [m]
    }))
  }
  const byDevice = new Map<string, MemberPlan[]>()
  members.forEach((m, i) => {
    const group = byDevice.get(devices[i]) ?? []
    group.push(m)
    byDevice.set(devices[i], group)
  })
  return [...byDevice.entries()].map(([device, group]) => ({
    label: `${batch ? 'batch' : 'device'}_${deviceLabel(device)}`,
    device,
    members: group
  }))
}

/**
 * Runs one backend's ensemble across the device pool and collects a member
 * record for every planned seed, failed or not.
 */
export const dispatchEnsemble = async (
  backend: PredictorBackend,
  plans: MemberPlan[],
  options: DispatchOptions
): Promise<EnsembleResult> => {
  const { inputs, workDir, logDir, signal, onMemberDone } = options
  const devices = assignDevices(plans.length, options.devices)
  const deviceOf = new Map(plans.map((m, i) => [m.seedIndex, devices[i]]))
  const batch = usesBatch(backend)
  const tasks = planTasks(backend, plans, devices, batch)
  const limit = pLimit(Math.max(1, options.maxParallelDevices))
  const timeoutMs = options.timeoutMs ?? backend.timeoutMs

  await makeDir(workDir)
  await makeDir(logDir)

  logger.info(
    `${backend.name}: ${plans.length} member(s) in ${tasks.length} task(s) (${batch ? 'batch' : 'per-member'})`
  )

  const collected: EnsembleMember[] = []
  const record = (plan: MemberPlan, outcome: PredictionOutcome) => {
    const member: EnsembleMember = {
      ...plan,
      backend: backend.name,
      device: deviceOf.get(plan.seedIndex) ?? devices[0],
      ...(outcome.structure ? { structure: outcome.structure } : {}),
      ...(outcome.structure && outcome.confidence ? { confidence: outcome.confidence } : {}),
      ...(outcome.failure ? { failure: outcome.failure } : {})
    }
    collected.push(member)
    if (member.failure) {
      logger.warn(
        `${backend.name} seed ${plan.seed}: ${member.failure.kind} (${member.failure.message})`
      )
    } else {
      logger.info(`${backend.name} seed ${plan.seed}: ${member.structure}`)
    }
    onMemberDone?.(member)
  }

  const runTask = async (task: Task) => {
    const ctx: InvocationContext = {
      inputs,
      device: task.device,
      workDir,
      logFile: path.join(logDir, `${task.label}.log`),
      timeoutMs,
      signal
    }

    const attempt = async (
      members: MemberPlan[],
      call: () => Promise<PredictionOutcome[]>
    ) => {
      if (signal?.aborted) {
        for (const m of members) {
          record(m, { seedIndex: m.seedIndex, failure: failure('aborted', 'interrupted before start') })
        }
        return
      }
      let outcomes: PredictionOutcome[]
      try {
        outcomes = await call()
      } catch (error) {
        const message = getErrorMessage(error)
        outcomes = members.map((m) => ({
          seedIndex: m.seedIndex,
          failure: failure('spawn_error', message)
        }))
      }
      for (const m of members) {
        const outcome = outcomes.find((o) => o.seedIndex === m.seedIndex) ?? {
          seedIndex: m.seedIndex,
          failure: failure('missing_output', 'backend returned no outcome for this member')
        }
        record(m, outcome)
      }
    }

    const { predictBatch } = backend
    if (batch && predictBatch) {
      await attempt(task.members, () =>
        predictBatch.call(backend, { ...ctx, members: task.members })
      )
      return
    }
    for (const member of task.members) {
      await attempt([member], async () => [await backend.predict({ ...ctx, member })])
    }
  }

  await Promise.all(tasks.map((task) => limit(() => runTask(task))))

  collected.sort((a, b) => a.seedIndex - b.seedIndex)
  const ok = collected.filter((m) => !m.failure).length
  logger.info(`${backend.name}: ${ok}/${collected.length} member(s) succeeded`)
  return { backend: backend.name, members: collected }
}
