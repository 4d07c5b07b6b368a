export { SqliteRecordStore } from "./sqliteRecordStore";
export { StoreConstraintViolation, RecordNotFoundError } from "./storeErrors";
