export class StudentSavedEvent {
  constructor(
    public readonly studentId: number,
    public readonly email: string,
  ) {}
}
