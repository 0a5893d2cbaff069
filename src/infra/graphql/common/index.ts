export { CommonScalars } from './scalars.js';
export { CommonGraphQLSchema } from './schema.js';
