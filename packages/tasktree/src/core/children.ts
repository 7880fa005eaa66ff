/**
 * Child collection used by tree nodes.
 *
 * @module core/children
 */

import { IntrusiveList, type ListLinks } from "./list.js";

/**
 * Members of a child collection report whether they are transient.
 */
export interface TransientMember<T> extends ListLinks<T> {
  readonly transient: boolean;
}

/**
 * An intrusive list that also counts its transient members, so that
 * {@link ChildCollection.isFinished} is O(1).
 */
export class ChildCollection<T extends TransientMember<T>> extends IntrusiveList<T> {
  private transients = 0;

  /** Number of present members whose `transient` flag is set. */
  get transientCount(): number {
    return this.transients;
  }

  insert(item: T): this {
    super.insert(item);

    if (item.transient) {
      this.transients++;
    }

    return this;
  }

  delete(item: T): this {
    super.delete(item);

    if (item.transient) {
      this.transients--;
    }

    return this;
  }

  /** Whether any present member is transient. */
  hasTransients(): boolean {
    return this.transients > 0;
  }

  /** True when every present member is transient (vacuously for an empty collection). */
  isFinished(): boolean {
    return this.size === this.transients;
  }
}
