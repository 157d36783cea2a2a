export { generateId, now } from './id';
export { cloneRows, identityKey, findDuplicateIdentity, missingIdentityColumns } from './rows';
export { inferSchema, inferValueType, type ValueType } from './schema';
