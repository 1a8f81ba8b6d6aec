/**
 * Role lookups and the guard helpers contracts call at the top of an entry point.
 */

import type { Address } from "../lib/ethereum/index.js";
import { UnauthorizedError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { OpResult } from "../runtime/types.js";
import { type AccessControl, Role } from "./types.js";

export interface RoleAssignments {
	readonly admins?: readonly Address[];
	readonly managers?: readonly Address[];
	readonly operators?: readonly Address[];
}

/** Fixed role table, built once at deployment. */
export class StaticAccessControl implements AccessControl {
	private readonly admins: ReadonlySet<Address>;
	private readonly managers: ReadonlySet<Address>;
	private readonly operators: ReadonlySet<Address>;

	constructor(roles: RoleAssignments) {
		this.admins = new Set(roles.admins ?? []);
		this.managers = new Set(roles.managers ?? []);
		this.operators = new Set(roles.operators ?? []);
	}

	isAdmin(account: Address): boolean {
		return this.admins.has(account);
	}

	isManager(account: Address): boolean {
		return this.managers.has(account);
	}

	isOperator(account: Address): boolean {
		return this.operators.has(account);
	}
}

export function hasRole(access: AccessControl, role: Role, account: Address): boolean {
	switch (role) {
		case Role.Admin:
			return access.isAdmin(account);
		case Role.Manager:
			return access.isManager(account);
		case Role.Operator:
			return access.isOperator(account);
	}
}

/** Fails closed unless `account` holds `role`. */
export function requireRole(
	access: AccessControl,
	role: Role,
	account: Address,
	operation: string,
): OpResult<void> {
	if (hasRole(access, role, account)) return ok(undefined);
	return err(
		new UnauthorizedError(`${operation} requires the ${role} role`, { account, role, operation }),
	);
}
