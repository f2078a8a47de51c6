/**
 * Domain Module - entities, value objects and ports
 *
 * Everything under src/domain is pure: no logger, no database driver,
 * no transport. Infrastructure implements the ports declared here.
 */

export * from './commands';
export * from './common/identifiers';
export * from './common/event-publisher.port';
export * from './common/timestamps';

export * from './users/value-objects';
export * from './users/user.entity';
export * from './users/user.ports';
export * from './users/user-domain.service';

export * from './payments/value-objects';
export * from './payments/payment.entity';
export * from './payments/payment.ports';

export * from './notifications/value-objects';
export * from './notifications/notification.entity';
export * from './notifications/notification.ports';
