/**
 * @file errors.ts
 * @description Taxonomie des erreurs du gestionnaire de peers
 *
 * Les codes sont des identifiants stables: la couche HTTP les traduit en
 * statuts, les tests les comparent directement.
 */

export type PeerErrorCode =
  | 'DuplicateKey'
  | 'PoolExhausted'
  | 'NotFound'
  | 'InterfaceUnavailable'
  | 'InterfaceError'
  | 'CorruptState'
  | 'PersistenceError'
  | 'MissingCredential'
  | 'AddressConflict'
  | 'InvalidRequest'
  | 'InconsistentState';

export class PeerError extends Error {
  readonly code: PeerErrorCode;
  /** Sortie brute de la commande wg, si applicable */
  readonly diagnostic?: string;

  constructor(code: PeerErrorCode, message: string, options: { diagnostic?: string; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PeerError';
    this.code = code;
    this.diagnostic = options.diagnostic;
  }
}

export function isPeerError(error: unknown, code?: PeerErrorCode): error is PeerError {
  return error instanceof PeerError && (code === undefined || error.code === code);
}

/**
 * Message lisible d'une erreur inconnue
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
