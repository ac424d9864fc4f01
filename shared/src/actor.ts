/** A non-player character. The name doubles as its key inside a room. */
export interface Actor {
    name: string
    description?: string
}

export function createActor(name: string, description?: string): Actor {
    return description === undefined ? { name } : { name, description }
}
