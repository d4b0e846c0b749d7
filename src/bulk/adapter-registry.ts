import { DOMAIN_TAGS, DomainTag } from "../types/bulk";
import { BulkAdapter } from "./bulk-adapter";
import { UnknownDomainError } from "./errors";

export function isDomainTag(value: string): value is DomainTag {
  return DOMAIN_TAGS.some((tag) => tag === value);
}

export class AdapterRegistry {
  private adapters = new Map<DomainTag, BulkAdapter>();

  register(adapter: BulkAdapter): void {
    this.adapters.set(adapter.domain, adapter);
  }

  get(domain: DomainTag): BulkAdapter | undefined {
    return this.adapters.get(domain);
  }

  resolve(domain: string): BulkAdapter {
    const adapter = isDomainTag(domain) ? this.get(domain) : undefined;
    if (!adapter) {
      throw new UnknownDomainError(domain, this.domains());
    }
    return adapter;
  }

  domains(): DomainTag[] {
    return [...this.adapters.keys()];
  }
}
