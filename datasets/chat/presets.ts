import type { ScalePreset } from '../types'

export const presets: ScalePreset[] = [
  {
    name: 'dev',
    description: 'Quick local dataset',
    users: 50,
    directChats: 40,
    groupChats: 10,
    messages: 2000,
  },
  {
    name: 'large',
    description: 'Default load-testing dataset',
    users: 200,
    directChats: 300,
    groupChats: 75,
    messages: 25000,
  },
  {
    name: 'xl',
    description: 'Upper end for query plan comparisons',
    users: 500,
    directChats: 500,
    groupChats: 200,
    messages: 50000,
  },
]

export function getPreset(name: string): ScalePreset | undefined {
  return presets.find((p) => p.name === name)
}

export function getPresetNames(): string[] {
  return presets.map((p) => p.name)
}
