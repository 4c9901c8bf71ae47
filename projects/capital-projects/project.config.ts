/**
 * Capital Projects Configuration
 *
 * Raw sources staged by this project and the schemas they live in. Every
 * project-type table shares the default column layout unless its entry says
 * otherwise.
 */

import type { SchemaNames, SourceDefinition } from '../../framework/etl/src/index.js';

export interface ProjectConfig {
  name: string;
  displayName: string;
  description: string;
  database: {
    schemas: SchemaNames;
  };
  etl: {
    batchSize: number;
    sources: SourceDefinition[];
  };
}

export const config: ProjectConfig = {
  name: 'capital-projects',
  displayName: 'Capital Projects',
  description: 'Cost and schedule outcomes of energy infrastructure construction projects',

  database: {
    schemas: {
      raw: 'raw',
      stage: 'stage',
      reference: 'reference',
    },
  },

  etl: {
    batchSize: 1000,
    sources: [
      { name: 'batteries_electrolyzer' },
      { name: 'batteries_storage' },
      { name: 'hydrogen_electrolyzer' },
      { name: 'solar_pv' },
      {
        name: 'transmission_lines',
        columns: {
          decisionDate: 'start_fid_date',
        },
      },
    ],
  },
};

/** The configured definition for a source, or the default layout for an unlisted one */
export function findSource(name: string): SourceDefinition {
  return config.etl.sources.find(s => s.name === name) ?? { name };
}

export default config;
