/**
 * Active teams tracked in LinearB. QA is tracked separately from the
 * engineering squads and is excluded from comparisons.
 */

import type { TeamDescriptor, TeamTypeInfo } from './types.js';

export const TEAM_CATALOG: readonly TeamDescriptor[] = [
  {
    id: 'analytics',
    name: 'Analytics',
    short_name: 'Aly',
    type: 'engineering',
    description: 'Analytics and data engineering team',
    color: '#DC143C',
    comparable: true,
    focus_areas: ['data analytics', 'business intelligence', 'data engineering'],
  },
  {
    id: 'cfd_titans',
    name: 'CFD (Titans)',
    short_name: 'CFD',
    type: 'engineering',
    description: 'CFD Titans engineering team',
    color: '#32CD32',
    comparable: true,
    focus_areas: ['Client Focus Delivery', 'Support'],
  },
  {
    id: 'core_crm',
    name: 'Core CRM',
    short_name: 'CC',
    type: 'engineering',
    description: 'Core CRM platform team',
    color: '#4169E1',
    comparable: true,
    focus_areas: ['customer relationship management', 'core platform'],
  },
  {
    id: 'integrations_synergy',
    name: 'Integrations(Synergy)',
    short_name: 'I',
    type: 'engineering',
    description: 'Integrations and Synergy team',
    color: '#FF8C00',
    comparable: true,
    focus_areas: ['system integrations', 'api development', 'third-party connections'],
  },
  {
    id: 'media',
    name: 'Media',
    short_name: 'Med',
    type: 'engineering',
    description: 'Media and content management team',
    color: '#00BFFF',
    comparable: true,
    focus_areas: ['media processing', 'content management', 'digital assets'],
  },
  {
    id: 'shinsei',
    name: 'Shinsei',
    short_name: 'S',
    type: 'engineering',
    description: 'Shinsei development team',
    color: '#DA70D6',
    comparable: true,
    focus_areas: ['new product development', 'innovation'],
  },
  {
    id: 'qa_automation',
    name: 'QA-Automation',
    short_name: 'QA',
    type: 'qa',
    description: 'Quality Assurance and Test Automation team',
    color: '#FFD700',
    comparable: false,
    focus_areas: ['test automation', 'quality assurance', 'testing frameworks'],
  },
];

export const TEAM_TYPE_INFO: readonly TeamTypeInfo[] = [
  {
    id: 'engineering',
    name: 'Engineering Teams',
    description: 'Software development and engineering teams',
    comparable: true,
  },
  {
    id: 'qa',
    name: 'Quality Assurance Teams',
    description: 'QA and testing teams - tracked separately from engineering squads',
    comparable: false,
  },
];
