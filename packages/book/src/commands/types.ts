/**
 * @fileoverview Command and result types
 *
 * A command is a plain tagged value: `group` selects the record group and
 * `kind` the action. Each variant carries only the fields its action needs,
 * already validated into value objects. Indexes refer to what is currently
 * displayed, so they are resolved only when the command runs.
 */

import type {
  Address,
  DateTime,
  Duration,
  Email,
  Index,
  ItemName,
  Message,
  MonthlyCountData,
  Name,
  Phone,
  Quantity,
  Remark,
  TagName,
  UnitPrice,
} from '@salesbook/core';
import type { Person } from '../model/person';
import type { TagNamespace } from '../model/record-kinds';

export type GeneralCommand =
  | { readonly group: 'general'; readonly kind: 'help' }
  | { readonly group: 'general'; readonly kind: 'exit' }
  | { readonly group: 'general'; readonly kind: 'clear' };

export interface PersonChanges {
  readonly name?: Name;
  readonly phone?: Phone;
  readonly email?: Email;
  readonly address?: Address;
  readonly remark?: Remark;
  /** Replaces every tag; an empty list clears them */
  readonly tags?: readonly TagName[];
}

export type PersonSortKey = 'name' | 'email';

export type ContactCommand =
  | { readonly group: 'contact'; readonly kind: 'add'; readonly person: Person }
  | { readonly group: 'contact'; readonly kind: 'edit'; readonly index: Index; readonly changes: PersonChanges }
  | { readonly group: 'contact'; readonly kind: 'delete'; readonly index: Index }
  | { readonly group: 'contact'; readonly kind: 'list' }
  | { readonly group: 'contact'; readonly kind: 'find'; readonly keywords: readonly string[] }
  | {
      readonly group: 'contact';
      readonly kind: 'sort';
      readonly key: PersonSortKey;
      readonly descending: boolean;
    };

export interface MeetingChanges {
  readonly contactIndex?: Index;
  readonly message?: Message;
  readonly start?: DateTime;
  readonly duration?: Duration;
}

export type MeetingCommand =
  | {
      readonly group: 'meeting';
      readonly kind: 'add';
      readonly contactIndex: Index;
      readonly message: Message;
      readonly start: DateTime;
      readonly duration: Duration;
    }
  | { readonly group: 'meeting'; readonly kind: 'edit'; readonly index: Index; readonly changes: MeetingChanges }
  | { readonly group: 'meeting'; readonly kind: 'delete'; readonly index: Index }
  | { readonly group: 'meeting'; readonly kind: 'list' }
  | { readonly group: 'meeting'; readonly kind: 'stats'; readonly months?: number };

export interface ReminderChanges {
  readonly contactIndex?: Index;
  readonly message?: Message;
  readonly scheduledAt?: DateTime;
}

export type ReminderCommand =
  | {
      readonly group: 'reminder';
      readonly kind: 'add';
      readonly contactIndex: Index;
      readonly message: Message;
      readonly scheduledAt: DateTime;
    }
  | { readonly group: 'reminder'; readonly kind: 'edit'; readonly index: Index; readonly changes: ReminderChanges }
  | { readonly group: 'reminder'; readonly kind: 'delete'; readonly index: Index }
  | { readonly group: 'reminder'; readonly kind: 'list' };

export interface SaleChanges {
  readonly contactIndex?: Index;
  readonly itemName?: ItemName;
  readonly datetime?: DateTime;
  readonly unitPrice?: UnitPrice;
  readonly quantity?: Quantity;
  readonly tags?: readonly TagName[];
}

export type SaleListFilter =
  | { readonly by: 'all' }
  | { readonly by: 'contact'; readonly contactIndex: Index }
  | { readonly by: 'tag'; readonly tag: TagName };

export type SaleCommand =
  | {
      readonly group: 'sale';
      readonly kind: 'add';
      readonly contactIndex: Index;
      readonly itemName: ItemName;
      readonly datetime: DateTime;
      readonly unitPrice: UnitPrice;
      readonly quantity: Quantity;
      readonly tags: readonly TagName[];
    }
  | { readonly group: 'sale'; readonly kind: 'edit'; readonly index: Index; readonly changes: SaleChanges }
  | { readonly group: 'sale'; readonly kind: 'delete'; readonly index: Index }
  | { readonly group: 'sale'; readonly kind: 'list'; readonly filter: SaleListFilter }
  | { readonly group: 'sale'; readonly kind: 'stats'; readonly months?: number };

export type TagCommand =
  | { readonly group: 'tag'; readonly kind: 'add'; readonly namespace: TagNamespace; readonly tag: TagName }
  | {
      readonly group: 'tag';
      readonly kind: 'edit';
      readonly namespace: TagNamespace;
      readonly index: Index;
      readonly name: TagName;
    }
  | { readonly group: 'tag'; readonly kind: 'delete'; readonly namespace: TagNamespace; readonly index: Index }
  | { readonly group: 'tag'; readonly kind: 'list' }
  | { readonly group: 'tag'; readonly kind: 'find'; readonly namespace: TagNamespace; readonly tag: TagName };

export type Command =
  | GeneralCommand
  | ContactCommand
  | MeetingCommand
  | ReminderCommand
  | SaleCommand
  | TagCommand;

export type CommandGroup = Command['group'];

/** Panel the presentation layer should bring forward */
export type Panel = 'contact' | 'meeting' | 'reminder' | 'sale' | 'tag';

export interface StatisticsReport {
  readonly group: 'meeting' | 'sale';
  /** Oldest month first */
  readonly rows: readonly MonthlyCountData[];
}

export interface CommandResult {
  readonly feedbackToUser: string;
  readonly showHelp: boolean;
  readonly exit: boolean;
  readonly clear: boolean;
  readonly statistics?: StatisticsReport;
  readonly panel?: Panel;
}
