export {
  childNodes,
  walk,
  findAll,
  isNodeOfType,
  findCommands,
  findEnvironments,
  getTextContent,
  getSections,
  getTitle,
  getAbstract,
  getCitationKeys
} from './query';
export type { Visitor, TextContentOptions, SectionInfo } from './query';
export { serialize } from './serialize';
export { formatTree } from './tree';
