export {
  parseResourcePath,
  parseTablePath,
  validateDataset,
  validateProject,
  validateTable,
} from './input';
export type { ResourcePath, TablePath } from './input';
