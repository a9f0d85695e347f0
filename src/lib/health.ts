import { StatusDocument } from './status-probe.js';
import { Health } from './types.js';

export const AUDIT_WARNING_THRESHOLD = 0.95;

// order matters, first match wins
export function classifyHealth(doc: StatusDocument): Health {
  if (!doc.lastContactSuccess) {
    return 'OFFLINE';
  }

  if (doc.disqualified) {
    return 'DISQUALIFIED';
  }

  const reputation = doc.reputation;
  if (reputation) {
    const auditScore = reputation.auditScore ?? 1.0;
    const suspensionScore = reputation.suspensionScore ?? 0.0;

    if (suspensionScore > 0) {
      return 'SUSPENDED';
    }
    if (auditScore < AUDIT_WARNING_THRESHOLD) {
      return 'WARNING';
    }
  }

  return 'ONLINE';
}
