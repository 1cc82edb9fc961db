import { loadIdeaCatalog, type BuildIdea, type IdeaCatalog } from '../config/catalog.js';

const MAX_IDEAS = 5;

export interface IdeaSource {
  ideasFor(category: string): readonly BuildIdea[];
}

export function createStaticIdeaSource(catalog: IdeaCatalog = loadIdeaCatalog()): IdeaSource {
  return {
    ideasFor: (category) => {
      const ideas = Object.hasOwn(catalog, category) ? catalog[category] : undefined;
      return ideas ? ideas.slice(0, MAX_IDEAS) : [];
    },
  };
}
