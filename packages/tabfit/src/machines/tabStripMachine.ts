/**
 * Tab Strip Machine - Recomputes tab names whenever the host changes
 *
 * The host reports resizes, tab lifecycle changes, renames and buffer
 * switches; each one re-pads every tab against the current config.
 *
 * Names are computed in an assign and written to the host by a separate
 * action, so resolving a snapshot without a running actor leaves the host
 * untouched. When the host can report changes, a callback actor forwards
 * them as events.
 *
 * States:
 * - active: every host event triggers a recompute
 * - suspended: events are ignored (config changes are still recorded);
 *   resuming recomputes once
 */

import { setup, assign, fromCallback } from 'xstate';
import type { TabStripContext, TabStripEvent, TabStripInput } from './types';
import type { HostChange, TabHost } from '../host/types';
import { createLayoutConfig, updateLayoutConfig } from '../tabs/config';
import { computeHostNames, writeHostNames } from '../host/tabNamer';

export const tabStripMachine = setup({
  types: {
    context: {} as TabStripContext,
    events: {} as TabStripEvent,
    input: {} as TabStripInput,
  },
  guards: {
    widthChanged: ({ context, event }) =>
      event.type === 'RESIZE' && event.width !== context.lastWidth,
  },
  actors: {
    hostListener: fromCallback<TabStripEvent, { host: TabHost }>(({ input, sendBack }) => {
      const unsubscribe = input.host.onChange?.((change) => sendBack(hostChangeToEvent(change)));
      return () => unsubscribe?.();
    }),
  },
  actions: {
    computeNames: assign(({ context, event }) => {
      const { tabs, current } = computeHostNames(context.host, context.config);
      return {
        tabs,
        currentName: current,
        lastWidth: context.host.getWidth(),
        recomputeCount: context.recomputeCount + 1,
        lastTrigger: event.type,
      };
    }),
    writeNames: ({ context }) => writeHostNames(context.host, context.tabs),
    applyConfig: assign(({ context, event }) => {
      if (event.type !== 'SET_CONFIG') return {};
      return { config: updateLayoutConfig(context.config, event.patch) };
    }),
  },
}).createMachine({
  id: 'tabStrip',
  initial: 'active',
  context: ({ input }) => ({
    host: input.host,
    config: createLayoutConfig(input.config),
    tabs: [],
    currentName: null,
    lastWidth: null,
    recomputeCount: 0,
    lastTrigger: null,
  }),
  invoke: {
    src: 'hostListener',
    input: ({ context }) => ({ host: context.host }),
  },
  states: {
    active: {
      entry: ['computeNames', 'writeNames'],
      on: {
        RESIZE: { guard: 'widthChanged', actions: ['computeNames', 'writeNames'] },
        TAB_OPENED: { actions: ['computeNames', 'writeNames'] },
        TAB_CLOSED: { actions: ['computeNames', 'writeNames'] },
        TAB_SELECTED: { actions: ['computeNames', 'writeNames'] },
        TAB_RENAMED: { actions: ['computeNames', 'writeNames'] },
        BUFFER_CHANGED: { actions: ['computeNames', 'writeNames'] },
        RECOMPUTE: { actions: ['computeNames', 'writeNames'] },
        SET_CONFIG: { actions: ['applyConfig', 'computeNames', 'writeNames'] },
        SUSPEND: { target: 'suspended' },
      },
    },

    suspended: {
      on: {
        SET_CONFIG: { actions: 'applyConfig' },
        RESUME: { target: 'active' },
      },
    },
  },
});

/** Translate a host change notification into a machine event */
export function hostChangeToEvent(change: HostChange): TabStripEvent {
  switch (change.type) {
    case 'resize':
      return { type: 'RESIZE', width: change.width };
    case 'open':
      return { type: 'TAB_OPENED', tabId: change.tabId };
    case 'close':
      return { type: 'TAB_CLOSED', tabId: change.tabId };
    case 'select':
      return { type: 'TAB_SELECTED', tabId: change.tabId };
    case 'rename':
      return { type: 'TAB_RENAMED', tabId: change.tabId };
    case 'buffer':
      return { type: 'BUFFER_CHANGED' };
  }
}
