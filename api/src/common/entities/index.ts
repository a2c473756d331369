export * from './actor.entity';
export * from './audit-log.entity';
export * from './lifecycle.entity';
export * from './membership.entity';
