import js from '@eslint/js';
import tseslint from 'typescript-eslint';
import prettier from 'eslint-config-prettier';

export default [
  js.configs.recommended,
  ...tseslint.configs.recommended,
  prettier,
  {
    rules: {
      '@typescript-eslint/no-explicit-any': 'error',
      '@typescript-eslint/no-unused-vars': [
        'error',
        {
          argsIgnorePattern: '^_',
          varsIgnorePattern: '^_',
        },
      ],
      'no-console': [
        'warn',
        {
          allow: ['warn', 'error'],
        },
      ],
    },
  },
  {
    ignores: ['dist', 'node_modules'],
  },
  // The runtime must stay deterministic: no clocks or randomness in the
  // evaluation and reconciliation paths
  {
    files: ['src/evaluator/**/*.ts', 'src/runtime/**/*.ts', 'src/renderer/**/*.ts'],
    rules: {
      'no-restricted-properties': [
        'error',
        {
          object: 'Math',
          property: 'random',
          message: 'Avoid Math.random in the reactive core; results must be reproducible.',
        },
        {
          object: 'Date',
          property: 'now',
          message: 'Avoid Date.now in the reactive core; pass timestamps in as state.',
        },
      ],
    },
  },
  {
    files: ['tests/**/*.ts'],
    languageOptions: {
      parser: tseslint.parser,
      parserOptions: {},
    },
  },
];
