/**
 * Internal node of a {@link Sequence}.
 * `prev`/`next` are `null` at the ends and after the node is removed.
 */
export class SequenceNode<T> {
    constructor(
        public readonly value: T,
        public prev: SequenceNode<T> | null = null,
        public next: SequenceNode<T> | null = null
    ) {}
}

/**
 * Doubly linked chain of nodes; the only source of positional order.
 *
 * Methods taking a node assume it belongs to this sequence. Ownership checks
 * are the caller's job (the ordered set resolves nodes through its index).
 */
export class Sequence<T> {
    #head: SequenceNode<T> | null = null;
    #tail: SequenceNode<T> | null = null;
    #length = 0;

    get length(): number { return this.#length; }
    front(): SequenceNode<T> | null { return this.#head; }
    back(): SequenceNode<T> | null { return this.#tail; }

    pushBack(value: T): SequenceNode<T> {
        const node = new SequenceNode(value);
        this.#linkAfter(node, this.#tail);
        return node;
    }

    pushFront(value: T): SequenceNode<T> {
        const node = new SequenceNode(value);
        this.#linkBefore(node, this.#head);
        return node;
    }

    insertAfter(value: T, mark: SequenceNode<T>): SequenceNode<T> {
        const node = new SequenceNode(value);
        this.#linkAfter(node, mark);
        return node;
    }

    insertBefore(value: T, mark: SequenceNode<T>): SequenceNode<T> {
        const node = new SequenceNode(value);
        this.#linkBefore(node, mark);
        return node;
    }

    /** Splices `node` to sit right after `mark`. No-op if they are the same node. */
    moveAfter(node: SequenceNode<T>, mark: SequenceNode<T>): void {
        if (node === mark || mark.next === node) return;
        this.#unlink(node);
        this.#linkAfter(node, mark);
    }

    /** Splices `node` to sit right before `mark`. No-op if they are the same node. */
    moveBefore(node: SequenceNode<T>, mark: SequenceNode<T>): void {
        if (node === mark || mark.prev === node) return;
        this.#unlink(node);
        this.#linkBefore(node, mark);
    }

    remove(node: SequenceNode<T>): T {
        this.#unlink(node);
        return node.value;
    }

    clear(): void {
        // Detach every node
        let curr = this.#head;
        while (curr) {
            const next = curr.next;
            curr.prev = null;
            curr.next = null;
            curr = next;
        }
        this.#head = null;
        this.#tail = null;
        this.#length = 0;
    }

    *nodes(): Generator<SequenceNode<T>> {
        for (let curr = this.#head; curr; curr = curr.next) yield curr;
    }

    *nodesReverse(): Generator<SequenceNode<T>> {
        for (let curr = this.#tail; curr; curr = curr.prev) yield curr;
    }

    // --- Link primitives ---

    /** Links a detached node after `prev`; `null` means "at the head". */
    #linkAfter(node: SequenceNode<T>, prev: SequenceNode<T> | null): void {
        const next = prev ? prev.next : this.#head;
        node.prev = prev;
        node.next = next;

        if (prev) prev.next = node;
        else this.#head = node;

        if (next) next.prev = node;
        else this.#tail = node;

        this.#length++;
    }

    /** Links a detached node before `next`; `null` means "at the tail". */
    #linkBefore(node: SequenceNode<T>, next: SequenceNode<T> | null): void {
        this.#linkAfter(node, next ? next.prev : this.#tail);
    }

    #unlink(node: SequenceNode<T>): void {
        const { prev, next } = node;

        if (prev) prev.next = next;
        else this.#head = next;

        if (next) next.prev = prev;
        else this.#tail = prev;

        node.prev = null;
        node.next = null;
        this.#length--;
    }
}
