// SPDX-License-Identifier: Apache-2.0

import {color, PRESET_TIMER, type ListrRendererValue, type ListrBaseClassOptions} from 'listr2';
import os from 'node:os';
import {PathEx} from '../business/utils/path-ex.js';

/**
 * Reads an ambient environment variable. Only this module and the CLI entry point read the process
 * environment; everything else receives its settings through the invocation config.
 */
export function getEnvironmentVariable(name: string): string | undefined {
  const value: string | undefined = process.env[name];
  return value ? value : undefined;
}

// -------------------- graphene related constants ------------------------------------------------------------------
export const GRAPHENE_HOME_DIR: string =
  getEnvironmentVariable('GRAPHENE_HOME') || PathEx.join(os.homedir(), '.graphene');
export const GRAPHENE_LOG_LEVEL: string = getEnvironmentVariable('GRAPHENE_LOG_LEVEL') || 'info';

export const DOCKER: string = 'docker';
export const DOCKER_COMPOSE: string = 'docker-compose';
export const GIT: string = 'git';
export const COMPOSE_SUBCOMMAND: string = 'compose';
export const COMPOSE_PROJECT_LABEL: string = 'com.docker.compose.project';

// -------------------- deployment layout ---------------------------------------------------------------------------
export const NETWORK_NAME_PREFIX: string = 'graphene-net';
export const DEPLOYMENT_ID_PREFIX: string = 'graphene_deployment';
export const CONFIG_ENV_DIR: string = PathEx.join('config', 'env');
export const SERVICES_DIR: string = 'services';
export const VOLUMES_DIR: string = 'volumes';
export const COMMON_ENV_FILE: string = '.env.common';
export const LOCAL_OVERRIDE_ENV_FILE: string = '.env.local';
export const DEFAULT_LOG_TAIL: number = 50;
export const VALIDATE_OUTPUT_MAX_LINES: number = 20;

// -------------------- node identity -------------------------------------------------------------------------------
export const NODE_IMAGE_REPOSITORY: string = 'graphene/tendermint';
export const NODE_IMAGE_DOCKERFILE: string = PathEx.join('docker', 'tendermint', 'Dockerfile');
export const NODE_TOOL_NAME: string = 'tendermint';
export const CONTAINER_CONFIG_DIR: string = '/tendermint/config';
export const CONTAINER_DATA_DIR: string = '/tendermint/data';
export const NODE_KEY_FILE: string = 'node_key.json';
export const PRIV_VALIDATOR_KEY_FILE: string = 'priv_validator_key.json';
export const PRIV_VALIDATOR_STATE_FILE: string = 'priv_validator_state.json';
export const NODE_KEY_ENV_VARIABLE: string = 'NODE_KEY_JSON';
export const PRIV_VALIDATOR_KEY_ENV_VARIABLE: string = 'PRIV_VALIDATOR_KEY_JSON';
export const KEY_FILE_MODE: number = 0o600;

// -------------------- message groups ------------------------------------------------------------------------------
export const NODE_KEYS_MESSAGE_GROUP: string = 'node-keys';
export const VALIDATOR_INFO_MESSAGE_GROUP: string = 'validator-info';
export const DEPLOYMENT_SUMMARY_MESSAGE_GROUP: string = 'deployment-summary';

/**
 * Listr related
 * @returns a object that defines the default color options
 */
export const LISTR_DEFAULT_RENDERER_TIMER_OPTION = {
  ...PRESET_TIMER,
  condition: (duration: number): boolean => duration > 100,
  format: (duration: number): typeof color.red => {
    if (duration > 30_000) {
      return color.red;
    }

    return color.green;
  },
};

export const LISTR_DEFAULT_OPTIONS: {
  DEFAULT: ListrBaseClassOptions<unknown, ListrRendererValue, ListrRendererValue>;
} = {
  DEFAULT: {
    concurrent: false,
    exitOnError: true,
    rendererOptions: {
      collapseSubtasks: false,
      timer: LISTR_DEFAULT_RENDERER_TIMER_OPTION,
      persistentOutput: true,
      clearOutput: false,
      collapseErrors: false,
      showErrorMessage: false,
      formatOutput: 'wrap',
    },
    fallbackRendererOptions: {
      timer: LISTR_DEFAULT_RENDERER_TIMER_OPTION,
    },
  },
};
