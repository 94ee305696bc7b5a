/**
 * Remote Catalog Interface
 *
 * The slice of the remote inventory API the resolver needs. The HTTP client
 * that implements it lives outside this package.
 */

export interface RemoteSchema {
  id: string;
  name: string;
}

export interface RemoteObjectType {
  id: string;
  name: string;
}

export interface IAssetsCatalog {
  /** Workspace the catalog is bound to */
  readonly workspaceId: string;
  /** Site base URL; part of the disk cache identity */
  readonly siteUrl: string;

  /**
   * All object schemas of the workspace
   */
  listSchemas(): Promise<RemoteSchema[]>;

  /**
   * Object types defined in one schema
   */
  listObjectTypes(schemaId: string): Promise<RemoteObjectType[]>;
}
