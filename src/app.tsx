import React, { useEffect, useCallback } from 'react'
import { Box, Text } from 'ink'
import { useAtomValue, useSetAtom } from 'jotai'
import { Provider } from 'jotai/react'
import { useHydrateAtoms } from 'jotai/utils'

import { currentScreenAtom, goBackAtom } from './navigation/navigation-atoms.js'
import {
  bucketAtom,
  errorAtom,
  isLoadingAtom,
  searchQueryAtom,
  statusMessageAtom,
  transactionsAtom,
} from './transactions/transaction-atoms.js'
import { Dashboard } from './dashboard/Dashboard.js'
import { TransactionAdd } from './transactions/TransactionAdd.js'
import { HelpScreen } from './shared/components/HelpScreen.js'
import type { AppConfig } from './config/config-types.js'
import type { DashboardView } from './dashboard/dashboard-session.js'
import {
  appendAndSave,
  reloadStore,
  type TransactionInput,
  type TransactionStore,
} from './ledger/index.js'
import { createLogger } from './shared/logger.js'

const log = createLogger('app')

interface AppContentProps {
  config: AppConfig
  store: TransactionStore
  onEdit: (view: DashboardView) => void
}

const AppContent = ({ config, store, onEdit }: AppContentProps) => {
  const screen = useAtomValue(currentScreenAtom)
  const goBack = useSetAtom(goBackAtom)

  const setTransactions = useSetAtom(transactionsAtom)
  const setIsLoading = useSetAtom(isLoadingAtom)
  const setError = useSetAtom(errorAtom)
  const setMessage = useSetAtom(statusMessageAtom)

  // The store hands out a live array; copy it so jotai sees a new value
  const refresh = useCallback(() => setTransactions([...store.all()]), [store, setTransactions])

  const loadData = useCallback(async () => {
    setIsLoading(true)
    setError(null)

    try {
      await reloadStore(store, config.ledger.path)
      setMessage(null)
    } catch (err) {
      // The store keeps its previous contents when the file fails to parse
      const message = err instanceof Error ? err.message : 'Failed to load ledger'
      log.error(message)
      setError(`Could not reload ${config.ledger.path}: ${message}`)
    } finally {
      refresh()
      setIsLoading(false)
    }
  }, [store, config.ledger.path, refresh])

  const addTransaction = useCallback(
    async (input: TransactionInput) => {
      // Throws before touching the store, so the form can retry
      const transaction = await appendAndSave(store, input, config.ledger.path)
      refresh()
      log.trace(`Added expense: ${JSON.stringify(transaction)}`)
      setMessage(`Added ${transaction.description || transaction.date}`)
      goBack()
    },
    [store, config.ledger.path, refresh, setMessage, goBack]
  )

  // Initial load happened before render; just publish the snapshot
  useEffect(() => {
    refresh()
  }, [refresh])

  // Render current screen
  switch (screen) {
    case 'dashboard':
      return (
        <Dashboard
          ledgerPath={config.ledger.path}
          pageSize={config.display.pageSize}
          onReload={loadData}
          onEdit={onEdit}
        />
      )

    case 'add':
      return <TransactionAdd onSubmit={addTransaction} onCancel={() => goBack()} />

    case 'help':
      return <HelpScreen onClose={() => goBack()} />

    default:
      return <Text>Unknown screen: {screen}</Text>
  }
}

interface HydrateProps {
  view: DashboardView
  children: React.ReactNode
}

const Hydrate = ({ view, children }: HydrateProps) => {
  useHydrateAtoms([
    [bucketAtom, view.bucket],
    [searchQueryAtom, view.query],
  ] as const)
  return <>{children}</>
}

interface AppProps {
  config: AppConfig
  store: TransactionStore
  /** Search and bucket to open with */
  initialView: DashboardView
  /** Suspends the dashboard to edit the ledger file */
  onEdit: (view: DashboardView) => void
}

export const App = ({ config, store, initialView, onEdit }: AppProps) => (
  <Provider>
    <Hydrate view={initialView}>
      <Box flexDirection="column">
        <AppContent config={config} store={store} onEdit={onEdit} />
      </Box>
    </Hydrate>
  </Provider>
)
