import React from 'react'
import { Box, Text } from 'ink'

export interface KeyHint {
  key: string
  label: string
}

interface KeyHintsProps {
  hints: readonly KeyHint[]
}

export const KeyHints = ({ hints }: KeyHintsProps) => (
  <Box marginTop={1} columnGap={2} flexWrap="wrap">
    {hints.map(({ key, label }) => (
      <Text key={key}>
        <Text color="cyan" bold>{key}</Text>
        <Text dimColor> {label}</Text>
      </Text>
    ))}
  </Box>
)
