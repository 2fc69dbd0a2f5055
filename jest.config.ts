import type { Config } from 'jest';

const config: Config = {
  verbose: true,
  rootDir: '.',
  roots: ['<rootDir>/src', '<rootDir>/test'],
  testEnvironment: 'node',
  moduleFileExtensions: ['js', 'json', 'ts'],
  transform: {
    '^.+\\.ts$': 'ts-jest',
  },
  collectCoverageFrom: [
    'src/**/*.ts',
    '!src/index.ts',
    '!src/**/*.module.ts',
  ],
  coverageDirectory: 'coverage',
  // Unit specs beside the sources plus the module-level suites under test/e2e.
  testRegex: '.*\\.(e2e-)?spec\\.ts$',
};

export default config;
