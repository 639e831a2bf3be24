// Aggregate factory: every node kind is built through `Ast.<Kind>(...)`

import { DataTypes } from '../datatypes/data_types.js';
import { Literals } from '../datatypes/literals.js';
import { Operators } from '../operators/operators.js';
import { Expressions } from '../operators/expressions.js';
import { ControlFlow } from '../flows/control_flow.js';
import { Comprehensions } from '../flows/comprehensions.js';
import { Variables } from '../declarations/variables.js';
import { Callables } from '../declarations/callables.js';
import { Classes } from '../declarations/classes.js';
import { Packages } from '../declarations/packages.js';

export const Ast = {
  ...DataTypes,
  ...Literals,
  ...Operators,
  ...Expressions,
  ...ControlFlow,
  ...Comprehensions,
  ...Variables,
  ...Callables,
  ...Classes,
  ...Packages,
};

export type AstFactories = typeof Ast;
