/**
 * @fileoverview mixgraph - separation oracle and PAG structural queries
 *
 * Read-only queries over mixed-edge causal graphs:
 * - m-separation (moralization and legal-path procedures)
 * - possible ancestors / descendants under partial orientation
 * - discriminating paths
 * - possible-d-separating sets
 * - collider, covering and orientation predicates
 *
 * @packageDocumentation
 */

// Errors
export {
  type GraphQueryErrorKind,
  GraphQueryError,
  UnknownNodeError,
  InvalidQueryError,
  isGraphQueryError,
} from './core/errors.js';

// Configuration
export {
  type SeparationStrategy,
  type OracleConfig,
  type OracleOptions,
  SeparationStrategySchema,
  OracleConfigSchema,
  DEFAULT_ORACLE_CONFIG,
  ORACLE_ENV_VARS,
  getEnvOracleConfig,
  resolveOracleConfig,
} from './config/oracle_config.js';

// Graph storage
export {
  type NodeId,
  type EdgeKind,
  type EndpointMark,
  type MixedEdge,
  type EdgeInput,
  type Neighbor,
  type MixedEdgeGraph,
  type MixedEdgeGraphInput,
  EDGE_KINDS,
  createMixedEdgeGraph,
  hasNode,
  assertNode,
  getNodes,
  getEdges,
  edgesByKind,
  edgesBetween,
  adjacent,
  adjacentNodes,
  hasEdge,
  neighbors,
  degree,
  endpointMark,
  otherEndpoint,
  marksAt,
  markAt,
  transposeGraph,
  formatEdge,
} from './graphs/mixed_edge_graph.js';

export {
  type GraphSpec,
  GraphSpecSchema,
  EdgeSpecSchema,
  parseGraphSpec,
  toGraphSpec,
} from './graphs/graph_spec.js';

export {
  type GraphPath,
  createPath,
  pathLength,
  pathEndpoints,
  formatPath,
} from './graphs/graph_path.js';

export {
  isPossiblyDirectedEdge,
  isDefiniteDirectedEdge,
  isColliderOnEdges,
} from './graphs/edge_marks.js';

// ADMG view
export {
  parents,
  children,
  spouses,
  ancestors,
  descendants,
  cComponents,
  isAcyclic,
  assertAdmg,
} from './graphs/admg.js';

// Predicates
export {
  isCollider,
  isDefiniteNoncollider,
  isCoveredTriple,
  isPossiblyDirected,
  isLegalPath,
  isUncoveredPath,
  isPossiblyDirectedPath,
  isColliderPath,
  isDefiniteNoncolliderPath,
} from './separation/path_predicates.js';

// Separation
export {
  type SeparationQuery,
  mSeparated,
  findMConnectingPath,
  supportsMoralization,
  validateSeparationQuery,
} from './separation/m_separation.js';

export { findMinimalMSeparator } from './separation/minimal_separator.js';

// PAG queries
export {
  possibleAncestors,
  possibleDescendants,
  possibleAncestorsOfSet,
  possibleDescendantsOfSet,
  isPossibleAncestor,
} from './pag/ancestral_reachability.js';

export { discriminatingPath } from './pag/discriminating_path.js';

export { pds, pdsPath } from './pag/pds.js';

// Telemetry
export {
  type LogContext,
  type LoggerFn,
  logDebug,
  logInfo,
  logWarning,
  logError,
} from './telemetry/logger.js';
