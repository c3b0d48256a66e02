export {
  createNamespace,
  listNamespaces,
  renameNamespace,
  deleteNamespace,
} from './namespace.js';
export { putKey, getKey, deleteKey, listKeys, type ListKeysOptions } from './key.js';
export { bulkPut, bulkDelete } from './bulk.js';
