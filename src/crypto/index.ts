export { sha256, hmacSha256, hashContent, HashChain, GENESIS_HASH } from './hasher.js';
export {
  generateKeyPair,
  saveKeyPair,
  loadKeyPair,
  signData,
  verifySignature,
  signAuditRecord,
  verifyAuditRecord,
  type KeyPair
} from './signer.js';
export { AuditLog, auditRecordSchema, type AuditStore, type AuditEntry, type AuditVerification } from './audit-log.js';
