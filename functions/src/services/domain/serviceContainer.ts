import type { Firestore } from 'firebase-admin/firestore';
import { StatusCheckDomainService } from './statusChecks/StatusCheckDomainService';
import { UserDomainService } from './users/UserDomainService';
import type { UserDomainServiceOptions } from './users/UserDomainService';
import { FirestoreStatusCheckRepository } from '../repositories/statusChecks/FirestoreStatusCheckRepository';
import type { StatusCheckRepository } from '../repositories/statusChecks/StatusCheckRepository';
import { FirestoreUserRepository } from '../repositories/users/FirestoreUserRepository';
import type { UserRepository } from '../repositories/users/UserRepository';

export type DomainServiceContainer = {
  statusCheckRepository: StatusCheckRepository;
  userRepository: UserRepository;
  statusCheckService: StatusCheckDomainService;
  userService: UserDomainService;
};

export type CreateDomainServiceContainerOptions = {
  db: Firestore;
  statusCheckRepository?: StatusCheckRepository;
  userRepository?: UserRepository;
  userServiceOptions?: UserDomainServiceOptions;
};

export function createDomainServiceContainer(
  options: CreateDomainServiceContainerOptions,
): DomainServiceContainer {
  const statusCheckRepository =
    options.statusCheckRepository ?? new FirestoreStatusCheckRepository(options.db);
  const userRepository = options.userRepository ?? new FirestoreUserRepository(options.db);

  return {
    statusCheckRepository,
    userRepository,
    statusCheckService: new StatusCheckDomainService(statusCheckRepository),
    userService: new UserDomainService(userRepository, options.userServiceOptions),
  };
}
