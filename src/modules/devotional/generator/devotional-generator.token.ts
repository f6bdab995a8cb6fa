export const DEVOTIONAL_GENERATOR = Symbol('DEVOTIONAL_GENERATOR');
