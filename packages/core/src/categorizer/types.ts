/**
 * Internal types for categorizer module.
 */

import type { Category, ExpenseCategory } from '../types/index.js';

/**
 * Category plus the fragment that selected it (null for the fallback).
 */
export interface Classification {
    category: Category;
    keyword: string | null;
}

/**
 * A keyword list in the table: "income" or one of the expense categories.
 */
export type KeywordGroup = ExpenseCategory | 'income';
