/**
 * Disjoint-set forest over string keys, with path compression.
 * `union` keeps the lexically smaller root so results do not depend
 * on the order unions are performed in.
 */
export class UnionFind {
    private parent = new Map<string, string>();

    add(key: string): void {
        if (!this.parent.has(key)) {
            this.parent.set(key, key);
        }
    }

    find(key: string): string {
        let root = key;
        let next = this.parent.get(root);
        while (next !== undefined && next !== root) {
            root = next;
            next = this.parent.get(root);
        }

        // Path compression
        let node = key;
        while (node !== root) {
            const up = this.parent.get(node);
            this.parent.set(node, root);
            if (up === undefined) break;
            node = up;
        }

        return root;
    }

    union(a: string, b: string): void {
        this.add(a);
        this.add(b);
        const rootA = this.find(a);
        const rootB = this.find(b);
        if (rootA === rootB) return;

        if (rootA < rootB) {
            this.parent.set(rootB, rootA);
        } else {
            this.parent.set(rootA, rootB);
        }
    }

    /**
     * All sets, keyed by root, members in insertion order.
     */
    groups(): Map<string, string[]> {
        const groups = new Map<string, string[]>();
        for (const key of this.parent.keys()) {
            const root = this.find(key);
            const members = groups.get(root);
            if (members) {
                members.push(key);
            } else {
                groups.set(root, [key]);
            }
        }
        return groups;
    }
}
