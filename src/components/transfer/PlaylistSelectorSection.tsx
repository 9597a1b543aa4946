import type { PlaylistItem } from '@/types'

interface PlaylistSelectorSectionProps {
    isMobile: boolean
    sourceName: string
    playlists: PlaylistItem[]
    loading: boolean
    lastError: string | null
    onToggleAll: (active: boolean) => void
    onToggleOne: (id: string, active: boolean) => void
}

export default function PlaylistSelectorSection({
    isMobile,
    sourceName,
    playlists,
    loading,
    lastError,
    onToggleAll,
    onToggleOne
}: PlaylistSelectorSectionProps) {
    const allSelected = playlists.length > 0 && playlists.every(playlist => playlist.selected)

    return (
        <div className={`flex flex-col ${isMobile ? 'h-[300px]' : 'h-full'} p-4`}>
            <div className="flex items-center justify-between mb-2">
                <h2 className="font-mono text-green-400">{sourceName} playlists</h2>
                <button
                    onClick={() => onToggleAll(!allSelected)}
                    disabled={playlists.length === 0}
                    className="text-xs font-mono text-green-300 hover:text-white disabled:text-gray-600"
                >
                    {allSelected ? 'Deselect All' : 'Select All'}
                </button>
            </div>

            {loading && (
                <div className="flex items-center justify-center py-4" role="status">
                    <div className="w-6 h-6 border-2 border-green-400 border-t-transparent rounded-full animate-spin" />
                </div>
            )}

            {!loading && playlists.length === 0 && (
                <p className="text-sm text-yellow-400 font-mono" title={lastError ?? undefined}>
                    No playlists found
                </p>
            )}

            <ul className="flex-1 overflow-y-auto space-y-1">
                {playlists.map(playlist => (
                    <li key={playlist.id}>
                        <label className="flex items-center gap-2 cursor-pointer">
                            <input
                                type="checkbox"
                                checked={playlist.selected}
                                onChange={event => onToggleOne(playlist.id, event.target.checked)}
                                aria-label={playlist.name}
                            />
                            {playlist.coverUrl && (
                                <img src={playlist.coverUrl} alt="" className="w-8 h-8 object-cover" />
                            )}
                            <span className="truncate">{playlist.name}</span>
                            <span className="ml-auto text-xs text-gray-400">{playlist.trackCount} tracks</span>
                        </label>
                    </li>
                ))}
            </ul>
        </div>
    )
}

