/**
 * On-device list storage
 */

export {
  createLocalListStore,
  LOCAL_STORE_FILE,
  type FileBackedListStore,
  type LocalListStoreOptions,
} from "./local-store.js";

export {
  createListRepository,
  type ListRepository,
  type ListRepositoryOptions,
} from "./list-repository.js";
