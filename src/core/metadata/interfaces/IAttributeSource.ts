/**
 * Attribute Source Interface
 *
 * Where raw attribute definitions come from: the remote API client in
 * production, an exported JSON file for offline checks.
 */

export interface IAttributeSource {
  /**
   * Raw attribute records of one object type, in display order.
   * Records are validated by the caller.
   */
  fetchAttributes(objectTypeId: string): Promise<unknown[]>;
}
