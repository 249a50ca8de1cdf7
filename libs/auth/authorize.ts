import {
    ActorRole,
    AUTHORITY_CAPABILITIES,
    Capability,
    HOLDER_CAPABILITIES
} from "./capabilities.js";
import { AuthorizationError } from "../errors/ledgerErrors.js";
import { getComponentLogger } from "../logging/logger.js";

const logger = getComponentLogger("AuthorizationPolicy");

export interface AuthorizationRequest {
    caller: string;
    capability: Capability;
    /** Holder of the policy being acted on, when there is one. */
    resourceHolder?: string;
}

export type AuthorizationDecision =
    | { allowed: true; role: ActorRole }
    | { allowed: false; role: ActorRole; reason: string };

/**
 * Authorization Policy
 * Holds the single trusted authority identity, injected at construction.
 */
export class AuthorizationPolicy {
    private readonly authorityId: string;

    constructor(authorityId: string) {
        const trimmed = authorityId.trim();
        if (trimmed === "") {
            throw new Error("AuthorizationPolicy requires a non-empty authority identity");
        }
        this.authorityId = trimmed;
    }

    get authority(): string {
        return this.authorityId;
    }

    isAuthority(caller: string): boolean {
        return caller === this.authorityId;
    }

    roleOf(caller: string, resourceHolder?: string): ActorRole {
        if (this.isAuthority(caller)) return "AUTHORITY";
        if (resourceHolder !== undefined && caller === resourceHolder) return "HOLDER";
        return "OTHER";
    }

    evaluate(request: AuthorizationRequest): AuthorizationDecision {
        const { caller, capability, resourceHolder } = request;
        const role = this.roleOf(caller, resourceHolder);

        switch (role) {
            case "AUTHORITY":
                return AUTHORITY_CAPABILITIES.includes(capability)
                    ? { allowed: true, role }
                    : { allowed: false, role, reason: "CAPABILITY_NOT_ALLOWED" };
            case "HOLDER":
                return HOLDER_CAPABILITIES.includes(capability)
                    ? { allowed: true, role }
                    : { allowed: false, role, reason: "CAPABILITY_NOT_ALLOWED" };
            case "OTHER":
                return { allowed: false, role, reason: resourceHolder === undefined ? "AUTHORITY_REQUIRED" : "NOT_POLICY_HOLDER" };
        }
    }

    /**
     * Throws AuthorizationError unless the caller may exercise the capability.
     */
    require(request: AuthorizationRequest): ActorRole {
        const decision = this.evaluate(request);
        if (!decision.allowed) {
            logger.warn({
                caller: request.caller,
                capability: request.capability,
                role: decision.role,
                reason: decision.reason
            }, "Authorization denied");
            throw new AuthorizationError(request.caller, request.capability);
        }
        return decision.role;
    }
}
