import { fileURLToPath } from 'url';

/** Dockerfile and compose script shipped beside src/ and dist/ */
export const TEMPLATES_DIR = fileURLToPath(new URL('../templates', import.meta.url));
