import type { Channel, Experiment, TrimRegion, TrimmedExperiment } from '@/types'
import { ConfigError } from '@/utils/errors'

/** The tagged temperature channel, else the first channel. */
export function referenceChannel(channels: Channel[], temperatureChannel: string | null): Channel | null {
  const tagged = temperatureChannel ? channels.find((c) => c.name === temperatureChannel) : undefined
  return tagged ?? channels.find((c) => c.role === 'temperature') ?? channels[0] ?? null
}

export function temperatureOf(trimmed: TrimmedExperiment): Channel | null {
  return trimmed.channels.find((c) => c.role === 'temperature') ?? null
}

function selectRows(channel: Channel, rows: number[]): Channel {
  return {
    ...channel,
    time: rows.map((idx) => channel.time[idx]),
    value: rows.map((idx) => channel.value[idx]),
  }
}

/**
 * Restricts every channel of an experiment to the rows whose reference-channel
 * time lies in `[startTime, endTime]`. A null region, or one that matches no
 * rows, yields channels with no samples.
 */
export function applyTrim(experiment: Experiment, region: TrimRegion): TrimmedExperiment {
  if (region && !(region.endTime >= region.startTime)) {
    throw new ConfigError(`Trim end (${region.endTime}) must not precede trim start (${region.startTime})`)
  }
  const reference = referenceChannel(experiment.channels, experiment.temperatureChannel)
  const rows: number[] = []
  if (region && reference) {
    reference.time.forEach((t, idx) => {
      if (t >= region.startTime && t <= region.endTime) rows.push(idx)
    })
  }
  return {
    experimentName: experiment.name,
    region: region ? { ...region } : null,
    channels: experiment.channels.map((channel) => selectRows(channel, rows)),
    temperatureChannel: experiment.temperatureChannel,
  }
}
