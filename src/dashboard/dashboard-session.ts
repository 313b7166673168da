import type { TimeBucket } from '../analytics/index.js'

/** What the dashboard was showing; restored after an edit */
export interface DashboardView {
  query: string
  bucket: TimeBucket
}

export interface MountedDashboard {
  unmount: () => void
  waitUntilExit: () => Promise<unknown>
}

export interface DashboardSessionOptions {
  mount: (view: DashboardView, onEdit: (view: DashboardView) => void) => MountedDashboard
  /** Opens the editor and reloads the ledger. A rejection keeps the old contents */
  edit: () => Promise<void>
  onEditError: (err: unknown) => void
}

/**
 * Keeps the dashboard running until the user quits. An edit unmounts it so
 * the editor gets the terminal, then mounts it again with the same view.
 */
export const runDashboardSession = async (
  initialView: DashboardView,
  { mount, edit, onEditError }: DashboardSessionOptions
): Promise<void> => {
  const session: { current: MountedDashboard | null; pendingRestart: Promise<void> | null } = {
    current: null,
    pendingRestart: null,
  }

  const start = (view: DashboardView) => {
    const instance = mount(view, (next) => {
      instance.unmount()
      session.pendingRestart = Promise.resolve()
        .then(edit)
        .catch(onEditError)
        .then(() => start(next))
    })
    session.current = instance
  }

  start(initialView)

  for (;;) {
    const instance = session.current
    if (!instance) break
    await instance.waitUntilExit()

    const restart = session.pendingRestart
    if (!restart) break
    session.pendingRestart = null
    await restart
  }
}
