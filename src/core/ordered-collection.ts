/**
 * Ordered Collection
 *
 * Named children of a container, kept in insertion order. Removal is
 * deferred: members are flagged any time and only physically dropped by
 * sweep(), which the owning container runs at the end of its update pass.
 */

/**
 * What a collection needs from its members.
 */
export interface CollectionMember {
    readonly name: string;
    readonly active: boolean;
    readonly pendingRemoval: boolean;
    /** 1-based position in the owning collection */
    index: number;
}

export class OrderedCollection<T extends CollectionMember> {
    /** Map iteration order is insertion order */
    private members: Map<string, T> = new Map();

    get size(): number {
        return this.members.size;
    }

    /**
     * Append a member and give it the last index.
     *
     * @returns false if a member with the same name is already held
     */
    add(member: T): boolean {
        if (this.members.has(member.name)) {
            return false;
        }
        this.members.set(member.name, member);
        member.index = this.members.size;
        return true;
    }

    get(name: string): T | undefined {
        return this.members.get(name);
    }

    has(name: string): boolean {
        return this.members.has(name);
    }

    /**
     * Snapshot of the members in insertion order.
     */
    values(): T[] {
        return Array.from(this.members.values());
    }

    /**
     * Visit every member. Iterates a snapshot, so members added by `fn`
     * are first visited on the next pass.
     */
    forEach(fn: (member: T) => void): void {
        for (const member of this.values()) {
            fn(member);
        }
    }

    /**
     * Visit every active member, in insertion order.
     */
    forEachActive(fn: (member: T) => void): void {
        for (const member of this.values()) {
            if (member.active) {
                fn(member);
            }
        }
    }

    /**
     * Drop every member flagged for removal. Indices of the remaining
     * members are rewritten to 1..size only when something was dropped.
     *
     * @returns The removed members, in their former order
     */
    sweep(): T[] {
        const removed: T[] = [];

        for (const [name, member] of this.members) {
            if (member.pendingRemoval) {
                this.members.delete(name);
                removed.push(member);
            }
        }

        if (removed.length > 0) {
            let index = 1;
            for (const member of this.members.values()) {
                member.index = index++;
            }
        }

        return removed;
    }
}
