/**
 * Collection Validator - static checks run before any task executes
 */

import type { CollectionValidationResult } from '../types';
import type { Collection } from './collection';
import type { Task } from './task';

interface RuleOutcome {
  pass: boolean;
  message?: string;
  severity?: 'error' | 'warning';
}

interface ValidationRule {
  name: string;
  validate: (taskName: string, task: Task, collection: Collection) => RuleOutcome;
}

export class Validator {
  private rules: ValidationRule[];

  constructor() {
    this.rules = [
      {
        name: 'known-prerequisites',
        validate: (_taskName, task, collection) => {
          const missing = task.pre.filter((name) => !collection.has(name));
          return {
            pass: missing.length === 0,
            message: `unknown prerequisite${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`,
          };
        },
      },
      {
        name: 'repeated-prerequisites',
        validate: (_taskName, task) => {
          const repeated = task.pre.filter((name, index) => task.pre.indexOf(name) !== index);
          return {
            pass: repeated.length === 0,
            message: `prerequisite listed more than once: ${[...new Set(repeated)].join(', ')}`,
            severity: 'warning',
          };
        },
      },
    ];
  }

  /**
   * Add a custom validation rule
   */
  addRule(rule: ValidationRule): void {
    this.rules.push(rule);
  }

  /**
   * Check every task reachable from the collection against all rules
   */
  validate(collection: Collection): CollectionValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    for (const [taskName, task] of collection.entries()) {
      for (const rule of this.rules) {
        const result = rule.validate(taskName, task, collection);
        if (result.pass || !result.message) {
          continue;
        }
        const line = `[${rule.name}] ${taskName}: ${result.message}`;
        if (result.severity === 'warning') {
          warnings.push(line);
        } else {
          errors.push(line);
        }
      }
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
    };
  }
}

export type { ValidationRule, RuleOutcome };
