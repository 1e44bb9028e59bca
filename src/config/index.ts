// src/config/index.ts
import { createConfig } from './factory';
import { defaultIndexConfiguration } from './default';

export { createConfig, defaultIndexConfiguration };

export default defaultIndexConfiguration;
