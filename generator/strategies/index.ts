import type { CountExpectations } from '../../verifier/types'
import type { GeneratorConfig } from '../config'
import { FixtureStrategy } from './fixture'
import { SamplingStrategy } from './sampling'
import type { GenerationStrategy } from './types'

export type { GenerationStrategy } from './types'
export { FixtureStrategy, loadFixtures, type Fixtures } from './fixture'
export { SamplingStrategy, loadVocabulary, type Vocabulary } from './sampling'

export function selectStrategy(config: GeneratorConfig): GenerationStrategy {
  switch (config.strategy) {
    case 'fixture':
      return new FixtureStrategy(config)
    case 'sampling':
      return new SamplingStrategy(config)
  }
}

/**
 * Entity counts a completed run of `config` should leave in the store.
 */
export function expectationsFor(config: GeneratorConfig): CountExpectations {
  return selectStrategy(config).expectations()
}
