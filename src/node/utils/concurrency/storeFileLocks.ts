import { MutexMap } from "./mutexMap";

/**
 * Shared write lock for every encrypted store file, keyed by absolute path.
 *
 * All writers of a document (domain stores, migrations, restore) go through this
 * one instance, so two handles opened on the same file still write in order and
 * a restore never interleaves with a pending document write.
 */
export const storeFileLocks = new MutexMap<string>();
