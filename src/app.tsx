import React, { useMemo } from 'react'
import { Box, Text } from 'ink'
import { createStore, useAtomValue, useSetAtom } from 'jotai'
import { Provider } from 'jotai/react'

import { currentScreenAtom, goBackAtom } from './navigation/navigation-atoms.js'
import { bindModelToStore } from './transactions/transaction-atoms.js'
import { TransactionList } from './transactions/TransactionList.js'
import { TransactionForm } from './transactions/TransactionForm.js'
import { HelpScreen } from './shared/components/HelpScreen.js'
import { TransactionModel } from './model/expense-tracker-model.js'
import { ExpenseController } from './controller/expense-controller.js'
import type { AppConfig } from './config/config-types.js'

interface AppContentProps {
  config: AppConfig
  controller: ExpenseController
}

const AppContent = ({ config, controller }: AppContentProps) => {
  const screen = useAtomValue(currentScreenAtom)
  const goBack = useSetAtom(goBackAtom)

  switch (screen) {
    case 'transactions':
      return (
        <TransactionList
          controller={controller}
          pageSize={config.display.pageSize}
          currencySymbol={config.display.currencySymbol}
        />
      )

    case 'add':
      return <TransactionForm controller={controller} />

    case 'help':
      return <HelpScreen onClose={() => goBack()} />

    default:
      return <Text>Unknown screen: {screen}</Text>
  }
}

interface AppProps {
  config: AppConfig
  model?: TransactionModel
}

export const App = ({ config, model }: AppProps) => {
  const { store, controller } = useMemo(() => {
    const target = model ?? new TransactionModel()
    const store = createStore()
    bindModelToStore(target, store)
    return { store, controller: new ExpenseController(target) }
  }, [model])

  return (
    <Provider store={store}>
      <Box flexDirection="column">
        <AppContent config={config} controller={controller} />
      </Box>
    </Provider>
  )
}
