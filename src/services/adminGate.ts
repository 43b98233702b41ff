import { DomainError, ErrorCode, ErrorStatus } from '../errors/taxonomy.js';

export interface AdminGate {
  /** Throws `unauthorized` unless the caller may perform privileged mutations. */
  requireAdmin(caller: string): void;
}

export class StaticAdminGate implements AdminGate {
  private readonly admins: Set<string>;

  constructor(addresses: readonly string[]) {
    this.admins = new Set(addresses.map((address) => address.trim()).filter(Boolean));
  }

  isAdmin(caller: string): boolean {
    return this.admins.has(caller);
  }

  requireAdmin(caller: string): void {
    if (!this.isAdmin(caller)) {
      throw new DomainError(ErrorCode.Unauthorized, ErrorStatus.unauthorized, 'Caller is not an admin.', { caller });
    }
  }
}
