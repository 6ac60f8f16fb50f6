/**
 * Connector Index - Export all connectors and types
 */

export * from './types';
export { harvest, replay, sinceToEpoch, type HarvestOptions } from './harvest';
export { StackExchangeConnector, type StackExchangeConnectorDeps } from './stackexchange';
export { GitBlameConnector, type GitBlameConnectorDeps } from './gitblame';

import type { ConnectorSpec, SourceConnector } from './types';
import { StackExchangeConnector, type StackExchangeConnectorDeps } from './stackexchange';
import { GitBlameConnector, type GitBlameConnectorDeps } from './gitblame';

export type AnyConnectorDeps = StackExchangeConnectorDeps & GitBlameConnectorDeps;

/**
 * Build a connector from its tagged spec
 */
export function createConnector(spec: ConnectorSpec, deps: AnyConnectorDeps = {}): SourceConnector {
  switch (spec.kind) {
    case 'stackexchange':
      return new StackExchangeConnector(spec.options, deps);
    case 'gitblame':
      return new GitBlameConnector(spec.options, deps);
  }
}
