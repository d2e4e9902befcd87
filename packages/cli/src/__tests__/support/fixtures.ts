import type { TemplateCatalog, TemplateEntry } from '../../templates/types';

/** Destinations of the packaged flask catalog, in generation order */
export const FLASK_DESTINATIONS = [
  'src/__init__.py',
  'run.py',
  'requirements.txt',
  'gunicorn.conf.py',
  'Dockerfile',
  'docker-compose.yml',
  'Makefile',
  '.gitignore',
  '.flake8',
  '.pylintrc',
  'src/config/config.json',
  '.env.template',
  'README.md',
  'src/secrets/.gitkeep',
  'deploy/.gitkeep',
];

export const FLASK_DIRECTORIES = ['src', 'src/config', 'src/secrets', 'deploy'];

export function entry(destination: string, content: string, overrides: Partial<TemplateEntry> = {}): TemplateEntry {
  return {
    destination,
    source: `${destination}.tmpl`,
    placeholders: [],
    executable: false,
    content,
    ...overrides,
  };
}

export function catalogOf(entries: TemplateEntry[], directories: string[] = []): TemplateCatalog {
  return { name: 'fixture', directories, entries };
}
