export type RotationState = {
  a: number;
  b: number;
};

export const ROTATION_STEP: Readonly<RotationState> = Object.freeze({ a: 0.04, b: 0.02 });

export const createRotationState = (a = 0, b = 0): RotationState => ({ a, b });

/** Angles only ever grow; sin/cos take care of the wrap. */
export const advanceRotation = (
  state: RotationState,
  step: Readonly<RotationState> = ROTATION_STEP,
): RotationState => ({
  a: state.a + step.a,
  b: state.b + step.b,
});
