import { StorageAdapter } from "./StorageAdapter";
import { MemoryStorageAdapter } from "./MemoryStorageAdapter";

const memoryStorageRegistry = new Map<string, MemoryStorageAdapter>();

/**
 * Get or create a MemoryStorageAdapter for the given queue name, so a Queue and
 * the Workers of the same name share one store. For Redis, pass a storage
 * instance directly to the Queue/Worker constructors.
 */
export function getMemoryStorage(queueName: string, capacity: number = 1000): StorageAdapter {
    let storage = memoryStorageRegistry.get(queueName);
    if (!storage) {
        storage = new MemoryStorageAdapter(capacity);
        memoryStorageRegistry.set(queueName, storage);
    }
    return storage;
}

export function clearMemoryStorageRegistry(): void {
    memoryStorageRegistry.clear();
}
