import { appEnv } from '@/config/env'
import { DIAGNOSTIC_HISTORY } from '@/logic/constants'
import type { SimEvent } from '@/types/sim'
import { createId } from '@/utils/ids'

type Listener = (event: SimEvent) => void

export type DiagnosticReport = Omit<SimEvent, 'eventId'>

/**
 * Runtime anomalies that must not stop the simulation: unknown commands,
 * rejected arguments and collision alerts. Keeps a short history and
 * notifies subscribers.
 */
export class DiagnosticLog {
  private events: SimEvent[] = []

  private listeners = new Set<Listener>()

  constructor(
    private history = DIAGNOSTIC_HISTORY,
    private verbose = appEnv.debugSim,
  ) {}

  report = (report: DiagnosticReport): SimEvent => {
    const event: SimEvent = { eventId: createId('event'), ...report }
    this.events = [...this.events, event].slice(-this.history)
    this.log(event)
    this.listeners.forEach((listener) => listener(event))
    return event
  }

  subscribe = (listener: Listener) => {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  getEvents = () => this.events

  clear = () => {
    this.events = []
  }

  private log(event: SimEvent) {
    const details = { t: event.t, ship: event.shipName }
    if (event.kind === 'unknown_command' || event.kind === 'invalid_argument') {
      console.warn(`[sim] ${event.message}`, details)
      return
    }
    if (this.verbose) {
      console.info(`[sim] ${event.kind}: ${event.message}`, details)
    }
  }
}
