/**
 * Authorization Policy
 *
 * Decides whether a caller may run a privileged action. Business logic asks
 * the policy and never compares identities itself, so single-admin,
 * multi-principal or role-based schemes can be swapped in.
 */

import { presaleLogger as logger } from "@stakeline/shared";
import type { PresaleState, PrivilegedAction } from "../types.js";

const authLogger = logger.child({ component: "authorization" });

// ============================================
// TYPES
// ============================================

export interface AuthorizationDecision {
  allowed: boolean;
  reason?: string;
}

export interface AuthorizationPolicy {
  authorize(
    caller: string,
    action: PrivilegedAction,
    presale: PresaleState
  ): AuthorizationDecision;
}

// ============================================
// ADMIN IDENTITY POLICY
// ============================================

/**
 * Admits only the admin recorded on PresaleState
 */
export class AdminIdentityPolicy implements AuthorizationPolicy {
  authorize(caller: string, _action: PrivilegedAction, presale: PresaleState): AuthorizationDecision {
    if (caller === presale.admin) {
      return { allowed: true };
    }
    return { allowed: false, reason: "Caller is not the presale admin" };
  }
}

// ============================================
// PRINCIPAL SET POLICY
// ============================================

export interface PrincipalSetPolicyConfig {
  /** Principals admitted for every privileged action */
  principals: string[];

  /** Extra principals admitted for specific actions only */
  perAction?: Partial<Record<PrivilegedAction, string[]>>;

  /** Also admit PresaleState.admin */
  includeAdmin: boolean;
}

export class PrincipalSetPolicy implements AuthorizationPolicy {
  private readonly principals: Set<string>;
  private readonly perAction: Map<PrivilegedAction, Set<string>> = new Map();
  private readonly includeAdmin: boolean;

  constructor(config: Partial<PrincipalSetPolicyConfig> = {}) {
    this.principals = new Set(config.principals ?? []);
    this.includeAdmin = config.includeAdmin ?? false;

    for (const [action, principals] of Object.entries(config.perAction ?? {})) {
      if (isPrivilegedAction(action) && principals) {
        this.perAction.set(action, new Set(principals));
      }
    }

    authLogger.info({
      principals: this.principals.size,
      scopedActions: [...this.perAction.keys()],
      includeAdmin: this.includeAdmin,
    }, "PrincipalSetPolicy initialized");
  }

  authorize(caller: string, action: PrivilegedAction, presale: PresaleState): AuthorizationDecision {
    if (this.includeAdmin && caller === presale.admin) {
      return { allowed: true };
    }
    if (this.principals.has(caller)) {
      return { allowed: true };
    }
    if (this.perAction.get(action)?.has(caller)) {
      return { allowed: true };
    }
    return { allowed: false, reason: `Caller is not a principal for ${action}` };
  }
}

const PRIVILEGED_ACTIONS: readonly PrivilegedAction[] = [
  "endPresale",
  "burnTokens",
  "refillRewardPool",
  "updateParameters",
  "withdrawFunds",
  "updatePresaleStage",
];

export function isPrivilegedAction(value: string): value is PrivilegedAction {
  return PRIVILEGED_ACTIONS.some((action) => action === value);
}
