import { ValidationError } from '../errors';
import { newUser, type User } from '../models/User';
import type { Repository } from '../repository/financeRepository';

export class UserService {
  constructor(private readonly repo: Repository) {}

  async createUser(input: { id?: string; email: string; name: string }): Promise<User> {
    return await this.repo.createUser(newUser(input));
  }

  async getUser(id: string): Promise<User> {
    if (!id.trim()) throw new ValidationError('user id is required');
    return await this.repo.getUser(id.trim());
  }
}
