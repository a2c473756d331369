/**
 * Identity attached to a request once its bearer token is verified.
 */
export interface Actor {
  userId: string;
  tenantId: string;
}
