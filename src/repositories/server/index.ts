export type { ServerCatalogRepository } from './ServerCatalogRepository.js';
export {
  ServerCatalogRepositoryImpl,
  type DatabaseConnector,
} from './ServerCatalogRepositoryImpl.js';
