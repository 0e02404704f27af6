import React from "react"
import { Box, Text } from "ink"
import type { BasediffConfig } from "@/config"

interface InitCommandProps {
  config: BasediffConfig
}

export function InitCommand({ config }: InitCommandProps) {
  return (
    <Box flexDirection="column">
      <Text bold color="green">
        Initialized basediff
      </Text>
      <Text> </Text>
      <Text> Upstream tree: {config.upstreamPath ?? "not set"}</Text>
      <Text> Vendor tree: {config.vendorPath ?? "not set"}</Text>
      <Text> Batch size: {config.batchSize}</Text>
      <Text> </Text>
      <Text color="gray">
        Run `basediff scan` to read both trees and classify their commits.
      </Text>
    </Box>
  )
}
