import { z } from 'zod';

// Wire-level shapes for game snapshots. Coordinates are axial; the fish
// grid is in offset order (`fish[y][x]`).

export const TeamNameSchema = z.enum(['ONE', 'TWO']);

export const HexCoordinateSchema = z.object({
  q: z.number().int(),
  r: z.number().int(),
});

export const MoveSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('place'),
    team: TeamNameSchema,
    to: HexCoordinateSchema,
  }),
  z.object({
    kind: z.literal('slide'),
    team: TeamNameSchema,
    from: HexCoordinateSchema,
    to: HexCoordinateSchema,
  }),
]);

export type MoveInput = z.infer<typeof MoveSchema>;

export const TeamSnapshotSchema = z.object({
  name: TeamNameSchema,
  penguins: z.array(HexCoordinateSchema).max(4, 'A team owns at most 4 penguins'),
  fish: z.number().int().min(0),
  moves: z.array(MoveSchema),
});

export type TeamSnapshotInput = z.infer<typeof TeamSnapshotSchema>;

export const GameStateSnapshotSchema = z
  .object({
    turn: z.number().int().min(0),
    fish: z
      .array(z.array(z.number().int().min(0)).min(1))
      .min(1, 'Board must have at least one row'),
    firstTeam: TeamSnapshotSchema,
    secondTeam: TeamSnapshotSchema,
    lastMove: MoveSchema.nullable(),
  })
  .refine((snapshot) => snapshot.firstTeam.name !== snapshot.secondTeam.name, {
    message: 'Teams must have different names',
    path: ['secondTeam', 'name'],
  });

export type GameStateSnapshotInput = z.infer<typeof GameStateSnapshotSchema>;
