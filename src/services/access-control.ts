// src/services/access-control.ts

export interface AccessPolicy {
  ownerId?: string;
  approvedUsers: string[];
}

// Owner or approved user; with no owner configured nobody is allowed
export function isAuthorized(userId: string, policy: AccessPolicy): boolean {
  if (!policy.ownerId) return false;
  if (userId === policy.ownerId) return true;
  return policy.approvedUsers.includes(userId);
}
