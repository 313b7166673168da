import React, { useState } from 'react'
import { Box, Text, useInput } from 'ink'
import TextInput from 'ink-text-input'
import { format } from 'date-fns'
import {
  capitalize,
  SUGGESTED_CATEGORIES,
  ValidationError,
  type TransactionInput,
} from '../ledger/index.js'
import { KeyHints } from '../shared/components/KeyHints.js'

interface TransactionAddProps {
  /** Appends and saves; throws ValidationError for a bad field */
  onSubmit: (input: TransactionInput) => Promise<void>
  onCancel: () => void
}

type Field = keyof TransactionInput

const FIELDS: Field[] = ['date', 'description', 'category', 'amount']

const LABELS: Record<Field, string> = {
  date: 'Date:',
  description: 'Description:',
  category: 'Category:',
  amount: 'Amount:',
}

const PLACEHOLDERS: Record<Field, string> = {
  date: 'YYYY-MM-DD or YYYY/MM/DD',
  description: 'e.g. Lunch with Sam',
  category: SUGGESTED_CATEGORIES.join(', '),
  amount: 'negative for an expense, e.g. -12.50',
}

export const TransactionAdd = ({ onSubmit, onCancel }: TransactionAddProps) => {
  const [values, setValues] = useState<TransactionInput>({
    date: format(new Date(), 'yyyy-MM-dd'),
    description: '',
    category: '',
    amount: '',
  })
  const [currentField, setCurrentField] = useState<Field>('date')
  const [error, setError] = useState<{ field: Field | null; message: string } | null>(null)
  const [isSaving, setIsSaving] = useState(false)

  const save = async () => {
    setIsSaving(true)
    setError(null)
    try {
      await onSubmit({ ...values, category: capitalize(values.category.trim()) })
    } catch (err) {
      setIsSaving(false)
      if (err instanceof ValidationError) {
        setError({ field: err.field, message: err.message })
        setCurrentField(err.field)
        return
      }
      setError({ field: null, message: err instanceof Error ? err.message : String(err) })
    }
  }

  useInput((_input, key) => {
    if (isSaving) return

    if (key.escape) {
      onCancel()
      return
    }

    if (key.return) {
      void save()
      return
    }

    if ((key.shift && key.tab) || key.upArrow) {
      const idx = FIELDS.indexOf(currentField)
      setCurrentField(FIELDS[(idx - 1 + FIELDS.length) % FIELDS.length] ?? 'date')
      return
    }

    if (key.tab || key.downArrow) {
      const idx = FIELDS.indexOf(currentField)
      setCurrentField(FIELDS[(idx + 1) % FIELDS.length] ?? 'date')
    }
  })

  const setField = (field: Field) => (value: string) =>
    setValues((prev) => ({ ...prev, [field]: value }))

  return (
    <Box flexDirection="column" padding={1}>
      <Box marginBottom={1}>
        <Text bold>Add Transaction</Text>
      </Box>

      <Box flexDirection="column" gap={1}>
        {FIELDS.map((field) => (
          <Box key={field} gap={1}>
            <Text color={currentField === field ? 'cyan' : undefined}>
              {currentField === field ? '▶' : ' '}
            </Text>
            <Box width={14}>
              <Text bold color={error?.field === field ? 'red' : undefined}>
                {LABELS[field]}
              </Text>
            </Box>
            {currentField === field ? (
              <TextInput
                value={values[field]}
                onChange={setField(field)}
                placeholder={PLACEHOLDERS[field]}
                focus={!isSaving}
              />
            ) : (
              <Text>{values[field] || <Text dimColor>empty</Text>}</Text>
            )}
          </Box>
        ))}
      </Box>

      {/* Status */}
      <Box marginTop={2}>
        {isSaving ? (
          <Text color="cyan">Saving...</Text>
        ) : error ? (
          <Text color="red">{error.message}</Text>
        ) : (
          <Text dimColor>Amounts are signed: -12.50 is money out, 12.50 money in</Text>
        )}
      </Box>

      <KeyHints
        hints={[
          { key: 'Tab/↓', label: 'next field' },
          { key: 'Shift+Tab/↑', label: 'prev field' },
          { key: 'Enter', label: 'save' },
          { key: 'Esc', label: 'cancel' },
        ]}
      />
    </Box>
  )
}
