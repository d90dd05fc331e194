// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {CommandHandler} from '../../../src/core/command-handler.js';
import {GrapheneError} from '../../../src/core/errors/graphene-error.js';
import {UserBreak} from '../../../src/core/errors/user-break.js';
import {type GrapheneListrTask} from '../../../src/types/index.js';
import {RecordingLogger} from '../../helpers/recording-logger.js';

interface CounterContext {
  count: number;
}

describe('CommandHandler', (): void => {
  const handler: CommandHandler = new CommandHandler(new RecordingLogger());

  it('should run the tasks in order and return their context', async (): Promise<void> => {
    const tasks: GrapheneListrTask<CounterContext>[] = [
      {
        title: 'first',
        task: (context_): void => {
          context_.count = 1;
        },
      },
      {
        title: 'second',
        task: (context_): void => {
          context_.count *= 5;
        },
      },
    ];

    const context: CounterContext = await handler.commandAction<CounterContext>(
      {_: ['status']},
      tasks,
      {renderer: 'silent'},
      'Error counting',
    );

    expect(context.count).to.equal(5);
  });

  it('should prefix unexpected errors with the error string', async (): Promise<void> => {
    const cause: Error = new Error('socket hang up');

    try {
      await handler.commandAction<CounterContext>(
        {_: ['status']},
        [
          {
            title: 'fail',
            task: (): void => {
              throw cause;
            },
          },
        ],
        {renderer: 'silent'},
        'Error reading deployment status',
      );
      expect.fail('Should have thrown an error');
    } catch (error) {
      expect(error).to.be.instanceOf(GrapheneError);
      if (error instanceof GrapheneError) {
        expect(error.message).to.equal('Error reading deployment status: socket hang up');
        expect(error.cause).to.equal(cause);
      }
    }
  });

  it('should pass a user break through unchanged', async (): Promise<void> => {
    const userBreak: UserBreak = new UserBreak('Aborted application by user prompt');

    try {
      await handler.commandAction<CounterContext>(
        {_: ['clean']},
        [
          {
            title: 'confirm',
            task: (): void => {
              throw userBreak;
            },
          },
        ],
        {renderer: 'silent'},
        'Error cleaning service groups',
      );
      expect.fail('Should have thrown an error');
    } catch (error) {
      expect(error).to.equal(userBreak);
    }
  });
});
